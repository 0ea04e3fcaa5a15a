import { ValidationError } from './errors.js';

/**
 * Money value object representing an amount in integer cents.
 * Amounts are stored as integer cents to avoid floating-point precision issues.
 * A balance is the amount owed, so it may go negative after an overpayment.
 */
export class Money {
  private constructor(public readonly cents: number) {}

  static fromCents(cents: number): Money {
    if (!Number.isSafeInteger(cents)) {
      throw new ValidationError(`Amount must be a whole number of cents, got ${cents}`);
    }
    return new Money(cents);
  }

  static zero(): Money {
    return new Money(0);
  }

  add(other: Money): Money {
    return new Money(this.cents + other.cents);
  }

  toString(): string {
    const sign = this.cents < 0 ? '-' : '';
    return `${sign}${(Math.abs(this.cents) / 100).toFixed(2)}`;
  }
}

/**
 * Round to the nearest integer, halves away from zero (so -0.5 becomes -1).
 */
export function roundHalfAwayFromZero(value: number): number {
  const rounded = Math.round(Math.abs(value));
  return value < 0 ? -rounded : rounded;
}

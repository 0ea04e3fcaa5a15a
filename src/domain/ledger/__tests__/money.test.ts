import { describe, it, expect } from 'vitest';
import { Money, roundHalfAwayFromZero } from '../money.js';
import { ValidationError } from '../errors.js';

describe('Money', () => {
  it('should reject fractional cents', () => {
    expect(() => Money.fromCents(10.5)).toThrow(ValidationError);
  });

  it('should format negative balances with a leading sign', () => {
    expect(Money.fromCents(-1234).toString()).toBe('-12.34');
    expect(Money.fromCents(5).toString()).toBe('0.05');
  });

  it('should add signed amounts', () => {
    expect(Money.fromCents(1000).add(Money.fromCents(-1250)).cents).toBe(-250);
  });
});

describe('roundHalfAwayFromZero', () => {
  it('should round halves away from zero in both directions', () => {
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(2.4)).toBe(2);
    expect(roundHalfAwayFromZero(-2.6)).toBe(-3);
  });
});

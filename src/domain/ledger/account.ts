import { Money, roundHalfAwayFromZero } from './money.js';
import { LedgerEvent, LedgerEventKind, PendingLedgerEvent } from './events.js';
import {
  CreditLimitExceededError,
  ProjectionIntegrityError,
  ValidationError,
} from './errors.js';

export const ACCOUNT_KINDS = [
  'revolving-credit',
  'home-equity-line',
  'installment-loan',
] as const;

export type AccountKind = (typeof ACCOUNT_KINDS)[number];

/**
 * Account terms. Registered once in the catalogue and never edited; the
 * balance is not part of it and only ever comes from the ledger.
 */
export interface CreditAccount {
  readonly accountId: string;
  readonly name: string;
  readonly kind: AccountKind;
  /** Annual percentage rate as a fraction (0.2999 = 29.99%). */
  readonly apr: number;
  readonly creditLimitCents: number | null;
  readonly promoRateExpiresAt: Date | null;
  /** Contractual minimum payment; null means the default rule applies. */
  readonly minimumPaymentCents: number | null;
  readonly openedAt: Date;
}

const MINIMUM_PAYMENT_FLOOR_CENTS = 2500;
const MINIMUM_PAYMENT_RATE = 0.02;

export function validateAccount(account: CreditAccount): void {
  if (!account.accountId.trim()) {
    throw new ValidationError('Account id is required');
  }
  if (!account.name.trim()) {
    throw new ValidationError('Account name is required');
  }
  if (!Number.isFinite(account.apr) || account.apr < 0 || account.apr > 1) {
    throw new ValidationError(`APR must be between 0 and 1, got ${account.apr}`);
  }
  if (account.creditLimitCents !== null) {
    if (!Number.isSafeInteger(account.creditLimitCents) || account.creditLimitCents < 0) {
      throw new ValidationError('Credit limit must be a non-negative whole number of cents');
    }
    if (account.kind === 'installment-loan') {
      throw new ValidationError('Installment loans do not carry a credit limit');
    }
  } else if (account.kind !== 'installment-loan') {
    throw new ValidationError(`A ${account.kind} account requires a credit limit`);
  }
  if (
    account.minimumPaymentCents !== null &&
    (!Number.isSafeInteger(account.minimumPaymentCents) || account.minimumPaymentCents < 0)
  ) {
    throw new ValidationError('Minimum payment must be a non-negative whole number of cents');
  }
}

/**
 * Minimum payment due on a balance, never more than the balance itself.
 */
export function minimumPaymentFor(account: CreditAccount, balanceCents: number): number {
  if (balanceCents <= 0) {
    return 0;
  }
  const contractual =
    account.minimumPaymentCents ??
    Math.max(
      MINIMUM_PAYMENT_FLOOR_CENTS,
      roundHalfAwayFromZero(balanceCents * MINIMUM_PAYMENT_RATE)
    );
  return Math.min(balanceCents, contractual);
}

/**
 * Ledger state of one account (reconstructed from events).
 */
export interface AccountLedgerState {
  readonly accountId: string;
  readonly balance: Money;
  readonly version: number;
  readonly lastOccurredAt: Date | null;
}

/**
 * Account ledger aggregate.
 * State is reconstructed by applying events in sequence, and every recorded
 * movement continues the balance chain from the current tail.
 */
export class AccountLedger {
  private constructor(
    public readonly account: CreditAccount,
    private state: AccountLedgerState
  ) {}

  static open(account: CreditAccount): AccountLedger {
    return new AccountLedger(account, {
      accountId: account.accountId,
      balance: Money.zero(),
      version: 0,
      lastOccurredAt: null,
    });
  }

  /**
   * Continue from the latest committed event without replaying the stream.
   */
  static fromTail(account: CreditAccount, tail: LedgerEvent | null): AccountLedger {
    return new AccountLedger(account, {
      accountId: account.accountId,
      balance: Money.fromCents(tail?.balanceAfterCents ?? 0),
      version: tail?.version ?? 0,
      lastOccurredAt: tail?.occurredAt ?? null,
    });
  }

  /**
   * Reconstruct the ledger by applying the account's events in version order.
   * A stored stream that breaks the balance chain is an integrity failure.
   */
  static fromEvents(account: CreditAccount, events: readonly LedgerEvent[]): AccountLedger {
    const ledger = AccountLedger.open(account);

    for (const event of events) {
      if (event.accountId !== account.accountId) {
        throw new ProjectionIntegrityError(
          `Event ${event.eventId} belongs to ${event.accountId}, not ${account.accountId}`
        );
      }
      if (event.version !== ledger.state.version + 1) {
        throw new ProjectionIntegrityError(
          `Stream ${account.accountId} jumps from version ${ledger.state.version} to ${event.version}`
        );
      }
      if (event.balanceBeforeCents !== ledger.state.balance.cents) {
        throw new ProjectionIntegrityError(
          `Stream ${account.accountId} breaks the balance chain at version ${event.version}`
        );
      }
      ledger.applyEvent(event);
    }

    return ledger;
  }

  getState(): AccountLedgerState {
    return { ...this.state };
  }

  recordCharge(
    amountCents: number,
    occurredAt: Date,
    causationId: string,
    description?: string
  ): PendingLedgerEvent {
    requirePositive(amountCents, 'Charge');
    this.ensureWithinLimit(amountCents);
    return this.record('charge', amountCents, occurredAt, causationId, description);
  }

  recordPayment(
    amountCents: number,
    occurredAt: Date,
    causationId: string,
    description?: string
  ): PendingLedgerEvent {
    requirePositive(amountCents, 'Payment');
    return this.record('payment', -amountCents, occurredAt, causationId, description);
  }

  recordTransferOut(
    amountCents: number,
    occurredAt: Date,
    causationId: string,
    description?: string
  ): PendingLedgerEvent {
    requirePositive(amountCents, 'Transfer');
    if (amountCents > this.state.balance.cents) {
      throw new ValidationError(
        `Cannot move ${amountCents} cents out of ${this.account.accountId}: balance is ${this.state.balance.cents} cents`
      );
    }
    return this.record('transfer-out', -amountCents, occurredAt, causationId, description);
  }

  recordTransferIn(
    amountCents: number,
    occurredAt: Date,
    causationId: string,
    description?: string
  ): PendingLedgerEvent {
    requirePositive(amountCents, 'Transfer');
    this.ensureWithinLimit(amountCents);
    return this.record('transfer-in', amountCents, occurredAt, causationId, description);
  }

  /**
   * Signed correction of the balance. Adjustments are how drift is repaired,
   * so they are not held to the credit limit.
   */
  recordAdjustment(
    deltaCents: number,
    occurredAt: Date,
    causationId: string,
    description?: string
  ): PendingLedgerEvent {
    if (!Number.isSafeInteger(deltaCents) || deltaCents === 0) {
      throw new ValidationError('Adjustment must be a non-zero whole number of cents');
    }
    return this.record('adjustment', deltaCents, occurredAt, causationId, description);
  }

  private ensureWithinLimit(increaseCents: number): void {
    const limit = this.account.creditLimitCents;
    if (limit === null) {
      return;
    }
    const attempted = this.state.balance.cents + increaseCents;
    if (attempted > limit) {
      throw new CreditLimitExceededError(this.account.accountId, limit, attempted);
    }
  }

  private record(
    kind: LedgerEventKind,
    signedAmountCents: number,
    occurredAt: Date,
    causationId: string,
    description?: string
  ): PendingLedgerEvent {
    if (Number.isNaN(occurredAt.getTime())) {
      throw new ValidationError('occurredAt must be a valid date');
    }

    const before = this.state.balance;
    const after = before.add(Money.fromCents(signedAmountCents));
    const event: PendingLedgerEvent = {
      accountId: this.account.accountId,
      kind,
      amountCents: signedAmountCents,
      balanceBeforeCents: before.cents,
      balanceAfterCents: after.cents,
      occurredAt,
      causationId,
      description,
    };

    this.applyEvent(event);
    return event;
  }

  private applyEvent(event: PendingLedgerEvent): void {
    this.state = {
      ...this.state,
      balance: Money.fromCents(event.balanceAfterCents),
      version: this.state.version + 1,
      lastOccurredAt: event.occurredAt,
    };
  }
}

function requirePositive(amountCents: number, what: string): void {
  if (!Number.isSafeInteger(amountCents) || amountCents <= 0) {
    throw new ValidationError(`${what} amount must be a positive whole number of cents`);
  }
}

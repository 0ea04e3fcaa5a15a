import { ValidationError } from './errors.js';

/**
 * Balance-changing events of the credit ledger.
 * Events are immutable: corrections are new adjustment events.
 */

export const LEDGER_EVENT_KINDS = [
  'charge',
  'payment',
  'transfer-out',
  'transfer-in',
  'adjustment',
] as const;

export type LedgerEventKind = (typeof LEDGER_EVENT_KINDS)[number];

/**
 * An event as built by the domain, before the store assigns identity and
 * position in the log.
 */
export interface PendingLedgerEvent {
  readonly accountId: string;
  readonly kind: LedgerEventKind;
  readonly amountCents: number;
  readonly balanceBeforeCents: number;
  readonly balanceAfterCents: number;
  readonly occurredAt: Date;
  readonly causationId: string;
  readonly description?: string;
}

export interface LedgerEvent extends PendingLedgerEvent {
  readonly eventId: string;
  /** Global commit order across all accounts. */
  readonly sequence: number;
  /** Position within the account's stream, starting at 1. */
  readonly version: number;
}

const KNOWN_KINDS: ReadonlySet<string> = new Set<string>(LEDGER_EVENT_KINDS);

export function isLedgerEventKind(value: string): value is LedgerEventKind {
  return KNOWN_KINDS.has(value);
}

/**
 * Order used by point-in-time folds: business time first, commit order second.
 */
export function compareByOccurrence(a: LedgerEvent, b: LedgerEvent): number {
  const byTime = a.occurredAt.getTime() - b.occurredAt.getTime();
  return byTime !== 0 ? byTime : a.sequence - b.sequence;
}

/**
 * Shape checks run before an event reaches the log.
 */
export function validatePendingEvent(event: PendingLedgerEvent): void {
  if (!event.accountId) {
    throw new ValidationError('Event must reference an account');
  }
  if (!isLedgerEventKind(event.kind)) {
    throw new ValidationError(`Unknown event kind: ${String(event.kind)}`);
  }
  if (!Number.isSafeInteger(event.amountCents) || event.amountCents === 0) {
    throw new ValidationError('Event amount must be a non-zero whole number of cents');
  }
  if (
    !Number.isSafeInteger(event.balanceBeforeCents) ||
    event.balanceAfterCents !== event.balanceBeforeCents + event.amountCents
  ) {
    throw new ValidationError('Event balances do not add up to its amount');
  }
  const increases = event.kind === 'charge' || event.kind === 'transfer-in';
  const decreases = event.kind === 'payment' || event.kind === 'transfer-out';
  if ((increases && event.amountCents < 0) || (decreases && event.amountCents > 0)) {
    throw new ValidationError(`A ${event.kind} cannot carry amount ${event.amountCents}`);
  }
  if (Number.isNaN(event.occurredAt.getTime())) {
    throw new ValidationError('occurredAt must be a valid date');
  }
  if (!event.causationId) {
    throw new ValidationError('Event must carry a causation id');
  }
}

import { CreditAccount } from '../../domain/ledger/account.js';
import { LedgerEvent, PendingLedgerEvent } from '../../domain/ledger/events.js';

/**
 * One account's share of an atomic insert: the events to append and the
 * stream version the writer read before building them.
 */
export interface StreamAppend {
  accountId: string;
  expectedVersion: number;
  events: PendingLedgerEvent[];
}

/**
 * Append-only storage of ledger events.
 * `insert` commits every stream append or none of them and rejects with
 * ConcurrencyConflictError when a stream moved past its expected version.
 */
export interface EventLogRepo {
  loadStream(accountId: string): Promise<LedgerEvent[]>;
  /** Every committed event in sequence order, read from one consistent view. */
  loadAll(): Promise<LedgerEvent[]>;
  /** Events whose version is past the stream's entry in `versions` (0 when absent). */
  loadAfterVersions(versions: ReadonlyMap<string, number>): Promise<LedgerEvent[]>;
  getTail(accountId: string): Promise<LedgerEvent | null>;
  findById(eventId: string): Promise<LedgerEvent | null>;
  insert(appends: StreamAppend[]): Promise<LedgerEvent[]>;
  /** Bulk load of a restored backup into an empty log. */
  importEvents(events: readonly LedgerEvent[]): Promise<void>;
}

export interface AccountRepo {
  save(account: CreditAccount): Promise<void>;
  findById(accountId: string): Promise<CreditAccount | null>;
  list(): Promise<CreditAccount[]>;
}

export interface StoredCommandResult {
  correlationId: string;
  eventIds: string[];
}

export type CommandReservation =
  | { status: 'new'; correlationId: string }
  | { status: 'duplicate'; result: StoredCommandResult }
  | { status: 'in_flight'; correlationId: string };

/**
 * Idempotency keys of executed commands.
 */
export interface CommandDedupRepo {
  reserve(idempotencyKey: string, commandType: string): Promise<CommandReservation>;
  complete(idempotencyKey: string, result: StoredCommandResult): Promise<void>;
  release(idempotencyKey: string): Promise<void>;
}

import { setTimeout as sleep } from 'timers/promises';
import {
  LedgerEvent,
  PendingLedgerEvent,
  validatePendingEvent,
} from '../../domain/ledger/events.js';
import { ConsistencyError, ValidationError } from '../../domain/ledger/errors.js';
import { ConcurrencyConflictError, PersistenceError } from '../errors.js';
import { AccountRepo, EventLogRepo, StreamAppend } from './ports.js';
import { KeyedMutex } from './keyedMutex.js';
import { getLogger, Logger } from '../../infra/logger.js';

export interface EventStoreOptions {
  /** Attempts per append before a conflict or storage failure is surfaced. */
  maxAttempts?: number;
  /** First backoff delay after a storage failure; doubles on every retry. */
  backoffMs?: number;
  /** When set, appends to accounts missing from the catalogue are refused. */
  accounts?: AccountRepo;
  logger?: Logger;
}

export type Tails = ReadonlyMap<string, LedgerEvent | null>;

/**
 * Builds the events to append from the tails read under the account locks.
 * Returning null (or an empty list) makes the append a no-op.
 */
export type AppendBuilder = (
  tails: Tails
) => PendingLedgerEvent[] | null | Promise<PendingLedgerEvent[] | null>;

/**
 * Append-only store of ledger events.
 *
 * Writes to one account are serialized: an in-process lock per account plus
 * the repository's expected-version check for writers in other processes.
 * A conflict re-reads the tail and re-validates before trying again; storage
 * failures back off exponentially. Both give up after `maxAttempts`.
 */
export class EventStore {
  private readonly locks = new KeyedMutex();
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly accounts: AccountRepo | null;
  private readonly logger: Logger;

  constructor(
    private readonly repo: EventLogRepo,
    options: EventStoreOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoffMs = options.backoffMs ?? 50;
    this.accounts = options.accounts ?? null;
    this.logger = options.logger ?? getLogger('event-store');
  }

  /**
   * Append one event whose balance_before must equal the tail's balance_after.
   * Throws ConsistencyError (log unchanged) when it does not.
   */
  async append(event: PendingLedgerEvent): Promise<LedgerEvent> {
    validatePendingEvent(event);
    const stored = await this.appendFromTails([event.accountId], () => [event]);
    const [committed] = stored;
    if (!committed) {
      throw new ValidationError('Append produced no event');
    }
    return committed;
  }

  /**
   * Read-then-append on a single account: `build` sees the current tail and
   * is called again with a fresh tail if another writer got there first.
   */
  async appendFromTail(
    accountId: string,
    build: (tail: LedgerEvent | null) => PendingLedgerEvent | null | Promise<PendingLedgerEvent | null>
  ): Promise<LedgerEvent | null> {
    const stored = await this.appendFromTails([accountId], async (tails) => {
      const event = await build(tails.get(accountId) ?? null);
      return event ? [event] : null;
    });
    return stored[0] ?? null;
  }

  /**
   * Read-then-append across several accounts, committed all-or-nothing.
   */
  async appendFromTails(accountIds: readonly string[], build: AppendBuilder): Promise<LedgerEvent[]> {
    await this.requireKnownAccounts(accountIds);
    return this.locks.runExclusive(accountIds, async () => {
      for (let attempt = 1; ; attempt++) {
        try {
          return await this.tryAppend(accountIds, build);
        } catch (error) {
          if (!this.shouldRetry(error, attempt)) {
            throw error;
          }
          if (error instanceof PersistenceError) {
            const delay = this.backoffMs * 2 ** (attempt - 1);
            this.logger.warn({ attempt, delay, err: error }, 'Storage unavailable, retrying append');
            await sleep(delay);
          } else {
            this.logger.warn({ attempt, err: error }, 'Stream moved during append, re-validating');
          }
        }
      }
    });
  }

  /**
   * Events of one account in stream order, optionally only those that
   * occurred at or before `upTo`.
   */
  async replay(accountId: string, upTo?: Date): Promise<LedgerEvent[]> {
    const events = await this.repo.loadStream(accountId);
    return upTo ? events.filter((event) => event.occurredAt <= upTo) : events;
  }

  /**
   * The whole log in commit order.
   */
  async replayAll(upTo?: Date): Promise<LedgerEvent[]> {
    const events = await this.repo.loadAll();
    return upTo ? events.filter((event) => event.occurredAt <= upTo) : events;
  }

  /**
   * Events past the given version of each stream; streams missing from
   * `versions` are read from the start.
   */
  async eventsAfterVersions(versions: ReadonlyMap<string, number>): Promise<LedgerEvent[]> {
    return this.repo.loadAfterVersions(versions);
  }

  async tail(accountId: string): Promise<LedgerEvent | null> {
    return this.repo.getTail(accountId);
  }

  async getEvent(eventId: string): Promise<LedgerEvent | null> {
    return this.repo.findById(eventId);
  }

  private async tryAppend(accountIds: readonly string[], build: AppendBuilder): Promise<LedgerEvent[]> {
    const tails = new Map<string, LedgerEvent | null>();
    for (const accountId of accountIds) {
      tails.set(accountId, await this.repo.getTail(accountId));
    }

    const events = (await build(tails)) ?? [];
    if (events.length === 0) {
      return [];
    }

    const appends = new Map<string, StreamAppend>();
    const running = new Map<string, number>();

    for (const event of events) {
      validatePendingEvent(event);
      if (!tails.has(event.accountId)) {
        throw new ValidationError(`Account ${event.accountId} is not locked for this append`);
      }

      const tail = tails.get(event.accountId) ?? null;
      const chainEnd = running.get(event.accountId) ?? tail?.balanceAfterCents ?? 0;
      if (event.balanceBeforeCents !== chainEnd) {
        throw new ConsistencyError(event.accountId, chainEnd, event.balanceBeforeCents);
      }
      running.set(event.accountId, event.balanceAfterCents);

      const append = appends.get(event.accountId);
      if (append) {
        append.events.push(event);
      } else {
        appends.set(event.accountId, {
          accountId: event.accountId,
          expectedVersion: tail?.version ?? 0,
          events: [event],
        });
      }
    }

    const stored = await this.repo.insert([...appends.values()]);
    for (const event of stored) {
      this.logger.debug(
        { eventId: event.eventId, accountId: event.accountId, kind: event.kind, amountCents: event.amountCents },
        'Event appended'
      );
    }
    return stored;
  }

  private async requireKnownAccounts(accountIds: readonly string[]): Promise<void> {
    if (!this.accounts) {
      return;
    }
    for (const accountId of accountIds) {
      if (!(await this.accounts.findById(accountId))) {
        throw new ValidationError(`Unknown account: ${accountId}`);
      }
    }
  }

  private shouldRetry(error: unknown, attempt: number): boolean {
    if (attempt >= this.maxAttempts) {
      return false;
    }
    return error instanceof ConcurrencyConflictError || error instanceof PersistenceError;
  }
}

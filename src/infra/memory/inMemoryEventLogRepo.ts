import { randomUUID } from 'crypto';
import { LedgerEvent } from '../../domain/ledger/events.js';
import { EventLogRepo, StreamAppend } from '../../application/ledger/ports.js';
import { ConcurrencyConflictError, PersistenceError } from '../../application/errors.js';

/**
 * Process-local event log. Each insert validates every expectation before
 * pushing anything, and runs without an await in between, so it commits whole.
 */
export class InMemoryEventLogRepo implements EventLogRepo {
  private readonly events: LedgerEvent[] = [];
  private readonly streams = new Map<string, LedgerEvent[]>();
  private lastSequence = 0;

  async loadStream(accountId: string): Promise<LedgerEvent[]> {
    return [...(this.streams.get(accountId) ?? [])];
  }

  async loadAll(): Promise<LedgerEvent[]> {
    return [...this.events];
  }

  async loadAfterVersions(versions: ReadonlyMap<string, number>): Promise<LedgerEvent[]> {
    return this.events.filter((event) => event.version > (versions.get(event.accountId) ?? 0));
  }

  async getTail(accountId: string): Promise<LedgerEvent | null> {
    const stream = this.streams.get(accountId);
    return stream?.[stream.length - 1] ?? null;
  }

  async findById(eventId: string): Promise<LedgerEvent | null> {
    return this.events.find((event) => event.eventId === eventId) ?? null;
  }

  async insert(appends: StreamAppend[]): Promise<LedgerEvent[]> {
    for (const append of appends) {
      const currentVersion = this.streams.get(append.accountId)?.length ?? 0;
      if (currentVersion !== append.expectedVersion) {
        throw new ConcurrencyConflictError(append.accountId, append.expectedVersion, currentVersion);
      }
    }

    const stored: LedgerEvent[] = [];
    for (const append of appends) {
      let version = append.expectedVersion;
      for (const pending of append.events) {
        version++;
        this.lastSequence++;
        stored.push({ ...pending, eventId: randomUUID(), sequence: this.lastSequence, version });
      }
    }

    for (const event of stored) {
      this.push(event);
    }
    return stored;
  }

  async importEvents(events: readonly LedgerEvent[]): Promise<void> {
    if (this.events.length > 0) {
      throw new PersistenceError('Cannot restore a backup into a non-empty event log');
    }
    const ordered = [...events].sort((a, b) => a.sequence - b.sequence);
    for (const event of ordered) {
      this.push(event);
      this.lastSequence = event.sequence;
    }
  }

  private push(event: LedgerEvent): void {
    this.events.push(event);
    const stream = this.streams.get(event.accountId);
    if (stream) {
      stream.push(event);
    } else {
      this.streams.set(event.accountId, [event]);
    }
  }
}

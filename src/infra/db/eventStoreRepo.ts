import type { Pool, PoolClient, QueryResultRow } from 'pg';
import { randomUUID } from 'crypto';
import {
  LedgerEvent,
  isLedgerEventKind,
} from '../../domain/ledger/events.js';
import { EventLogRepo, StreamAppend } from '../../application/ledger/ports.js';
import { ConcurrencyConflictError, PersistenceError } from '../../application/errors.js';
import { isUniqueViolation, toPersistenceError } from './pgErrors.js';

type EventRow = {
  event_seq: string;
  event_id: string;
  account_id: string;
  version: number;
  event_type: string;
  amount_cents: string;
  balance_before_cents: string;
  balance_after_cents: string;
  occurred_at: Date;
  causation_id: string;
  description: string | null;
};

const EVENT_COLUMNS = `event_seq, event_id, account_id, version, event_type, amount_cents,
       balance_before_cents, balance_after_cents, occurred_at, causation_id, description`;

function toLedgerEvent(row: EventRow): LedgerEvent {
  if (!isLedgerEventKind(row.event_type)) {
    throw new PersistenceError(`Unknown event type in log: ${row.event_type}`);
  }
  return {
    eventId: row.event_id,
    sequence: Number(row.event_seq),
    accountId: row.account_id,
    version: row.version,
    kind: row.event_type,
    amountCents: Number(row.amount_cents),
    balanceBeforeCents: Number(row.balance_before_cents),
    balanceAfterCents: Number(row.balance_after_cents),
    occurredAt: row.occurred_at,
    causationId: row.causation_id,
    description: row.description ?? undefined,
  };
}

/**
 * PostgreSQL event log. Appends take a per-account advisory lock and check the
 * stream version inside the transaction, so writers in other processes are
 * serialized per account as well.
 */
export class EventStoreRepo implements EventLogRepo {
  constructor(private readonly pool: Pool) {}

  /**
   * Load all events for an account stream.
   */
  async loadStream(accountId: string): Promise<LedgerEvent[]> {
    const result = await this.query<EventRow>(
      `SELECT ${EVENT_COLUMNS}
       FROM events
       WHERE account_id = $1
       ORDER BY version ASC`,
      [accountId]
    );
    return result.rows.map(toLedgerEvent);
  }

  /**
   * Load the whole log from a single snapshot of the database, so a
   * concurrent commit is either entirely in the result or entirely out.
   */
  async loadAll(): Promise<LedgerEvent[]> {
    return this.withClient(async (client) => {
      await client.query('BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY');
      try {
        const result = await client.query<EventRow>(
          `SELECT ${EVENT_COLUMNS} FROM events ORDER BY event_seq ASC`
        );
        await client.query('COMMIT');
        return result.rows.map(toLedgerEvent);
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    });
  }

  /**
   * Catch-up read keyed on stream versions rather than event_seq: sequence
   * values are taken before commit, so a lower one can become visible late,
   * while a stream's versions always commit in order.
   */
  async loadAfterVersions(versions: ReadonlyMap<string, number>): Promise<LedgerEvent[]> {
    const result = await this.query<EventRow>(
      `SELECT ${EVENT_COLUMNS}
       FROM events
       WHERE version > COALESCE(
         (SELECT seen.version
          FROM unnest($1::text[], $2::int[]) AS seen(account_id, version)
          WHERE seen.account_id = events.account_id),
         0)
       ORDER BY event_seq ASC`,
      [[...versions.keys()], [...versions.values()]]
    );
    return result.rows.map(toLedgerEvent);
  }

  async getTail(accountId: string): Promise<LedgerEvent | null> {
    const result = await this.query<EventRow>(
      `SELECT ${EVENT_COLUMNS}
       FROM events
       WHERE account_id = $1
       ORDER BY version DESC
       LIMIT 1`,
      [accountId]
    );
    const row = result.rows[0];
    return row ? toLedgerEvent(row) : null;
  }

  async findById(eventId: string): Promise<LedgerEvent | null> {
    const result = await this.query<EventRow>(
      `SELECT ${EVENT_COLUMNS} FROM events WHERE event_id = $1`,
      [eventId]
    );
    const row = result.rows[0];
    return row ? toLedgerEvent(row) : null;
  }

  /**
   * Append events to one or more streams in a single transaction.
   * Throws ConcurrencyConflictError if any expectedVersion doesn't match.
   */
  async insert(appends: StreamAppend[]): Promise<LedgerEvent[]> {
    if (appends.every((append) => append.events.length === 0)) {
      return [];
    }

    return this.withClient(async (client) => {
      try {
        await client.query('BEGIN');
        const stored: LedgerEvent[] = [];

        // Lock in a stable order so two multi-stream appends cannot deadlock
        const ordered = [...appends].sort((a, b) => a.accountId.localeCompare(b.accountId));
        for (const append of ordered) {
          await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [append.accountId]);
        }

        for (const append of appends) {
          stored.push(...(await this.appendWithClient(client, append)));
        }

        await client.query('COMMIT');
        return stored.sort((a, b) => a.sequence - b.sequence);
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    });
  }

  async importEvents(events: readonly LedgerEvent[]): Promise<void> {
    await this.withClient(async (client) => {
      try {
        await client.query('BEGIN');
        const existing = await client.query<{ count: string }>('SELECT COUNT(*) AS count FROM events');
        if (Number(existing.rows[0]?.count ?? 0) > 0) {
          throw new PersistenceError('Cannot restore a backup into a non-empty event log');
        }

        for (const event of events) {
          await client.query(
            `INSERT INTO events (
              event_seq, event_id, account_id, version, event_type, amount_cents,
              balance_before_cents, balance_after_cents, occurred_at, causation_id, description
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
            [
              event.sequence,
              event.eventId,
              event.accountId,
              event.version,
              event.kind,
              event.amountCents,
              event.balanceBeforeCents,
              event.balanceAfterCents,
              event.occurredAt,
              event.causationId,
              event.description ?? null,
            ]
          );
        }

        await client.query(
          `SELECT setval(pg_get_serial_sequence('events', 'event_seq'), GREATEST((SELECT MAX(event_seq) FROM events), 1))`
        );
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    });
  }

  private async appendWithClient(client: PoolClient, append: StreamAppend): Promise<LedgerEvent[]> {
    const versionResult = await client.query<{ version: number }>(
      `SELECT COALESCE(MAX(version), 0) AS version
       FROM events
       WHERE account_id = $1`,
      [append.accountId]
    );
    const currentVersion = versionResult.rows[0]?.version ?? 0;

    if (currentVersion !== append.expectedVersion) {
      throw new ConcurrencyConflictError(append.accountId, append.expectedVersion, currentVersion);
    }

    const stored: LedgerEvent[] = [];
    let nextVersion = append.expectedVersion + 1;

    for (const event of append.events) {
      const eventId = randomUUID();
      let sequence: number;

      try {
        const result = await client.query<{ event_seq: string }>(
          `INSERT INTO events (
            event_id, account_id, version, event_type, amount_cents,
            balance_before_cents, balance_after_cents, occurred_at, causation_id, description
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
          RETURNING event_seq`,
          [
            eventId,
            append.accountId,
            nextVersion,
            event.kind,
            event.amountCents,
            event.balanceBeforeCents,
            event.balanceAfterCents,
            event.occurredAt,
            event.causationId,
            event.description ?? null,
          ]
        );
        sequence = Number(result.rows[0]?.event_seq);
      } catch (error: unknown) {
        // Another writer took this version between our check and insert
        if (isUniqueViolation(error)) {
          throw new ConcurrencyConflictError(append.accountId, append.expectedVersion, nextVersion);
        }
        throw error;
      }

      stored.push({ ...event, eventId, sequence, version: nextVersion });
      nextVersion++;
    }

    return stored;
  }

  private async query<R extends QueryResultRow>(text: string, params: unknown[] = []) {
    try {
      return await this.pool.query<R>(text, params);
    } catch (error) {
      throw toPersistenceError(error);
    }
  }

  private async withClient<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw toPersistenceError(error);
    }

    try {
      return await fn(client);
    } catch (error) {
      throw toPersistenceError(error);
    } finally {
      client.release();
    }
  }
}

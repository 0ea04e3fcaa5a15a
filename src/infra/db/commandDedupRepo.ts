import type { Pool } from 'pg';
import { randomUUID } from 'crypto';
import {
  CommandDedupRepo,
  CommandReservation,
  StoredCommandResult,
} from '../../application/ledger/ports.js';
import { toPersistenceError } from './pgErrors.js';

export class PgCommandDedupRepo implements CommandDedupRepo {
  constructor(private readonly pool: Pool) {}

  /**
   * Begin a command execution with idempotency check.
   * A fresh correlation id wins the insert only when the key is new; otherwise
   * the stored row tells whether the first attempt finished.
   */
  async reserve(idempotencyKey: string, commandType: string): Promise<CommandReservation> {
    const correlationId = randomUUID();

    try {
      const result = await this.pool.query<{
        correlation_id: string;
        event_ids: string[] | null;
      }>(
        `INSERT INTO command_dedup (idempotency_key, command_type, correlation_id)
         VALUES ($1, $2, $3)
         ON CONFLICT (idempotency_key)
         DO UPDATE SET idempotency_key = command_dedup.idempotency_key
         RETURNING correlation_id, event_ids`,
        [idempotencyKey, commandType, correlationId]
      );

      const row = result.rows[0];
      if (!row || row.correlation_id === correlationId) {
        return { status: 'new', correlationId };
      }
      if (row.event_ids === null) {
        return { status: 'in_flight', correlationId: row.correlation_id };
      }
      return {
        status: 'duplicate',
        result: { correlationId: row.correlation_id, eventIds: row.event_ids },
      };
    } catch (error) {
      throw toPersistenceError(error);
    }
  }

  async complete(idempotencyKey: string, result: StoredCommandResult): Promise<void> {
    try {
      await this.pool.query(
        `UPDATE command_dedup
         SET event_ids = $2, completed_at = NOW()
         WHERE idempotency_key = $1`,
        [idempotencyKey, result.eventIds]
      );
    } catch (error) {
      throw toPersistenceError(error);
    }
  }

  async release(idempotencyKey: string): Promise<void> {
    try {
      await this.pool.query(
        `DELETE FROM command_dedup WHERE idempotency_key = $1 AND event_ids IS NULL`,
        [idempotencyKey]
      );
    } catch (error) {
      throw toPersistenceError(error);
    }
  }
}

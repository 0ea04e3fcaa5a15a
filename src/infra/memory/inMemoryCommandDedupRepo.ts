import { randomUUID } from 'crypto';
import {
  CommandDedupRepo,
  CommandReservation,
  StoredCommandResult,
} from '../../application/ledger/ports.js';

interface DedupEntry {
  commandType: string;
  correlationId: string;
  result: StoredCommandResult | null;
}

export class InMemoryCommandDedupRepo implements CommandDedupRepo {
  private readonly entries = new Map<string, DedupEntry>();

  async reserve(idempotencyKey: string, commandType: string): Promise<CommandReservation> {
    const existing = this.entries.get(idempotencyKey);
    if (existing) {
      return existing.result
        ? { status: 'duplicate', result: existing.result }
        : { status: 'in_flight', correlationId: existing.correlationId };
    }

    const correlationId = randomUUID();
    this.entries.set(idempotencyKey, { commandType, correlationId, result: null });
    return { status: 'new', correlationId };
  }

  async complete(idempotencyKey: string, result: StoredCommandResult): Promise<void> {
    const entry = this.entries.get(idempotencyKey);
    if (entry) {
      entry.result = result;
    }
  }

  async release(idempotencyKey: string): Promise<void> {
    const entry = this.entries.get(idempotencyKey);
    if (entry && !entry.result) {
      this.entries.delete(idempotencyKey);
    }
  }
}

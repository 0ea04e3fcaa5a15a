import { randomUUID } from 'crypto';
import { LedgerEvent } from '../../domain/ledger/events.js';
import { CreditAccount } from '../../domain/ledger/account.js';
import { ConflictError, NotFoundError } from '../errors.js';
import { AccountRepo, CommandDedupRepo } from './ports.js';
import { EventStore } from './eventStore.js';

export interface CommandOutcome {
  correlationId: string;
  events: LedgerEvent[];
  /** True when the idempotency key had already been executed. */
  duplicate: boolean;
}

/**
 * Runs commands at most once per idempotency key. A duplicate gets the events
 * of the first execution back; a failed execution frees its key for a retry.
 */
export class CommandRunner {
  constructor(
    private readonly eventStore: EventStore,
    private readonly commandDedup: CommandDedupRepo
  ) {}

  async run(
    idempotencyKey: string | undefined,
    commandType: string,
    execute: (correlationId: string) => Promise<LedgerEvent[]>
  ): Promise<CommandOutcome> {
    if (!idempotencyKey) {
      const correlationId = randomUUID();
      return { correlationId, events: await execute(correlationId), duplicate: false };
    }

    const reservation = await this.commandDedup.reserve(idempotencyKey, commandType);

    if (reservation.status === 'duplicate') {
      const events: LedgerEvent[] = [];
      for (const eventId of reservation.result.eventIds) {
        const event = await this.eventStore.getEvent(eventId);
        if (event) {
          events.push(event);
        }
      }
      return { correlationId: reservation.result.correlationId, events, duplicate: true };
    }

    if (reservation.status === 'in_flight') {
      throw new ConflictError(`Command with idempotency key ${idempotencyKey} is still running`);
    }

    let events: LedgerEvent[];
    try {
      events = await execute(reservation.correlationId);
    } catch (error) {
      await this.commandDedup.release(idempotencyKey);
      throw error;
    }

    await this.commandDedup.complete(idempotencyKey, {
      correlationId: reservation.correlationId,
      eventIds: events.map((event) => event.eventId),
    });
    return { correlationId: reservation.correlationId, events, duplicate: false };
  }
}

export async function requireAccount(accounts: AccountRepo, accountId: string): Promise<CreditAccount> {
  const account = await accounts.findById(accountId);
  if (!account) {
    throw new NotFoundError(`Account not found: ${accountId}`);
  }
  return account;
}

import { AccountLedger } from '../../domain/ledger/account.js';
import { LedgerEvent } from '../../domain/ledger/events.js';
import { ValidationError } from '../../domain/ledger/errors.js';
import { EventStore } from './eventStore.js';
import { CommandRunner, requireAccount } from './commandRunner.js';
import { AccountRepo } from './ports.js';

export interface UpdateBalanceCommand {
  accountId: string;
  /** The balance the account should have afterwards. */
  balanceCents: number;
  occurredAt?: Date;
  description?: string;
  idempotencyKey?: string;
}

export interface UpdateBalanceResult {
  correlationId: string;
  /** Null when the balance already matched (no-op). */
  event: LedgerEvent | null;
  balanceCents: number;
  duplicate: boolean;
}

/**
 * Set an account to a known balance with a single adjustment for the
 * difference. Nothing is written when the balance already matches.
 */
export class UpdateBalanceUseCase {
  constructor(
    private eventStore: EventStore,
    private accounts: AccountRepo,
    private commands: CommandRunner
  ) {}

  async execute(command: UpdateBalanceCommand): Promise<UpdateBalanceResult> {
    if (!Number.isSafeInteger(command.balanceCents)) {
      throw new ValidationError('Balance must be a whole number of cents');
    }
    const account = await requireAccount(this.accounts, command.accountId);
    const occurredAt = command.occurredAt ?? new Date();

    const outcome = await this.commands.run(command.idempotencyKey, 'updateBalance', async (correlationId) => {
      const event = await this.eventStore.appendFromTail(command.accountId, (tail) => {
        const delta = command.balanceCents - (tail?.balanceAfterCents ?? 0);
        if (delta === 0) {
          return null;
        }
        return AccountLedger.fromTail(account, tail).recordAdjustment(
          delta,
          occurredAt,
          correlationId,
          command.description ?? 'Balance update'
        );
      });
      return event ? [event] : [];
    });

    const tail = await this.eventStore.tail(command.accountId);
    return {
      correlationId: outcome.correlationId,
      event: outcome.events[0] ?? null,
      balanceCents: tail?.balanceAfterCents ?? 0,
      duplicate: outcome.duplicate,
    };
  }
}

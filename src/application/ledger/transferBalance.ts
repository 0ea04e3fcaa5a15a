import { AccountLedger } from '../../domain/ledger/account.js';
import { LedgerEvent } from '../../domain/ledger/events.js';
import { ValidationError } from '../../domain/ledger/errors.js';
import { EventStore } from './eventStore.js';
import { CommandRunner, requireAccount } from './commandRunner.js';
import { AccountRepo } from './ports.js';

export interface TransferBalanceCommand {
  fromAccountId: string;
  toAccountId: string;
  amountCents: number;
  occurredAt?: Date;
  description?: string;
  idempotencyKey?: string;
}

export interface TransferBalanceResult {
  correlationId: string;
  events: LedgerEvent[];
  fromBalanceCents: number;
  toBalanceCents: number;
  duplicate: boolean;
}

/**
 * Move owed balance from one account to another (acting on an arbitrage
 * opportunity). Both legs are committed together or not at all.
 */
export class TransferBalanceUseCase {
  constructor(
    private eventStore: EventStore,
    private accounts: AccountRepo,
    private commands: CommandRunner
  ) {}

  async execute(command: TransferBalanceCommand): Promise<TransferBalanceResult> {
    if (command.fromAccountId === command.toAccountId) {
      throw new ValidationError('Cannot transfer a balance onto the same account');
    }

    const fromAccount = await requireAccount(this.accounts, command.fromAccountId);
    const toAccount = await requireAccount(this.accounts, command.toAccountId);
    const occurredAt = command.occurredAt ?? new Date();

    const outcome = await this.commands.run(command.idempotencyKey, 'transferBalance', (correlationId) =>
      this.eventStore.appendFromTails([command.fromAccountId, command.toAccountId], (tails) => {
        // Domain logic - may throw ValidationError or CreditLimitExceededError
        const sent = AccountLedger.fromTail(fromAccount, tails.get(command.fromAccountId) ?? null).recordTransferOut(
          command.amountCents,
          occurredAt,
          correlationId,
          command.description
        );
        const received = AccountLedger.fromTail(toAccount, tails.get(command.toAccountId) ?? null).recordTransferIn(
          command.amountCents,
          occurredAt,
          correlationId,
          command.description
        );
        return [sent, received];
      })
    );

    const [fromTail, toTail] = await Promise.all([
      this.eventStore.tail(command.fromAccountId),
      this.eventStore.tail(command.toAccountId),
    ]);

    return {
      correlationId: outcome.correlationId,
      events: outcome.events,
      fromBalanceCents: fromTail?.balanceAfterCents ?? 0,
      toBalanceCents: toTail?.balanceAfterCents ?? 0,
      duplicate: outcome.duplicate,
    };
  }
}

import { AccountLedger } from '../../domain/ledger/account.js';
import { LedgerEvent } from '../../domain/ledger/events.js';
import { EventStore } from './eventStore.js';
import { CommandRunner, requireAccount } from './commandRunner.js';
import { AccountRepo } from './ports.js';

export interface RecordPaymentCommand {
  accountId: string;
  amountCents: number;
  occurredAt?: Date;
  description?: string;
  idempotencyKey?: string;
}

export interface RecordPaymentResult {
  correlationId: string;
  event: LedgerEvent | null;
  balanceCents: number;
  duplicate: boolean;
}

export class RecordPaymentUseCase {
  constructor(
    private eventStore: EventStore,
    private accounts: AccountRepo,
    private commands: CommandRunner
  ) {}

  async execute(command: RecordPaymentCommand): Promise<RecordPaymentResult> {
    const account = await requireAccount(this.accounts, command.accountId);
    const occurredAt = command.occurredAt ?? new Date();

    const outcome = await this.commands.run(command.idempotencyKey, 'recordPayment', async (correlationId) => {
      const event = await this.eventStore.appendFromTail(command.accountId, (tail) =>
        AccountLedger.fromTail(account, tail).recordPayment(
          command.amountCents,
          occurredAt,
          correlationId,
          command.description
        )
      );
      return event ? [event] : [];
    });

    // Current balance, also for a duplicate whose event is no longer the tail
    const tail = await this.eventStore.tail(command.accountId);
    return {
      correlationId: outcome.correlationId,
      event: outcome.events[0] ?? null,
      balanceCents: tail?.balanceAfterCents ?? 0,
      duplicate: outcome.duplicate,
    };
  }
}

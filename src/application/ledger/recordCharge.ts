import { AccountLedger } from '../../domain/ledger/account.js';
import { LedgerEvent } from '../../domain/ledger/events.js';
import { EventStore } from './eventStore.js';
import { CommandRunner, requireAccount } from './commandRunner.js';
import { AccountRepo } from './ports.js';

export interface RecordChargeCommand {
  accountId: string;
  amountCents: number;
  occurredAt?: Date;
  description?: string;
  idempotencyKey?: string;
}

export interface RecordChargeResult {
  correlationId: string;
  event: LedgerEvent | null;
  balanceCents: number;
  duplicate: boolean;
}

export class RecordChargeUseCase {
  constructor(
    private eventStore: EventStore,
    private accounts: AccountRepo,
    private commands: CommandRunner
  ) {}

  async execute(command: RecordChargeCommand): Promise<RecordChargeResult> {
    const account = await requireAccount(this.accounts, command.accountId);
    const occurredAt = command.occurredAt ?? new Date();

    const outcome = await this.commands.run(command.idempotencyKey, 'recordCharge', async (correlationId) => {
      // Domain logic may throw InvalidAmount/CreditLimitExceeded before anything is written
      const event = await this.eventStore.appendFromTail(command.accountId, (tail) =>
        AccountLedger.fromTail(account, tail).recordCharge(
          command.amountCents,
          occurredAt,
          correlationId,
          command.description
        )
      );
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

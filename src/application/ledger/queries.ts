import { CreditAccount } from '../../domain/ledger/account.js';
import { LedgerEvent } from '../../domain/ledger/events.js';
import { ValidationError } from '../../domain/ledger/errors.js';
import { EventStore } from './eventStore.js';
import { ProjectionBuilder, Snapshot } from './projectionBuilder.js';
import { requireAccount } from './commandRunner.js';
import { AccountRepo } from './ports.js';

export interface AccountWithBalance extends CreditAccount {
  balanceCents: number;
}

export interface HistoryRange {
  from?: Date;
  to?: Date;
}

export class LedgerQueries {
  constructor(
    private eventStore: EventStore,
    private projection: ProjectionBuilder,
    private accounts: AccountRepo
  ) {}

  async getAccounts(): Promise<AccountWithBalance[]> {
    const [accounts, snapshot] = await Promise.all([this.accounts.list(), this.projection.snapshot()]);
    return accounts.map((account) => ({
      ...account,
      balanceCents: snapshot.balances.get(account.accountId) ?? 0,
    }));
  }

  async getAccount(accountId: string): Promise<AccountWithBalance> {
    const account = await requireAccount(this.accounts, accountId);
    const balanceCents = await this.projection.balanceOf(accountId);
    return { ...account, balanceCents };
  }

  /**
   * Events of one account whose business time falls in [from, to], in
   * stream order.
   */
  async queryHistory(accountId: string, range: HistoryRange = {}): Promise<LedgerEvent[]> {
    if (range.from && range.to && range.from > range.to) {
      throw new ValidationError('History range starts after it ends');
    }
    await requireAccount(this.accounts, accountId);

    const events = await this.eventStore.replay(accountId, range.to);
    const from = range.from;
    return from ? events.filter((event) => event.occurredAt >= from) : events;
  }

  async snapshot(asOf?: Date): Promise<Snapshot> {
    return this.projection.snapshot(asOf);
  }
}

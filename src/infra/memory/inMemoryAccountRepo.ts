import { CreditAccount } from '../../domain/ledger/account.js';
import { AccountRepo } from '../../application/ledger/ports.js';
import { ConflictError } from '../../application/errors.js';

export class InMemoryAccountRepo implements AccountRepo {
  private readonly accounts = new Map<string, CreditAccount>();

  async save(account: CreditAccount): Promise<void> {
    if (this.accounts.has(account.accountId)) {
      throw new ConflictError(`Account already exists: ${account.accountId}`);
    }
    this.accounts.set(account.accountId, account);
  }

  async findById(accountId: string): Promise<CreditAccount | null> {
    return this.accounts.get(accountId) ?? null;
  }

  async list(): Promise<CreditAccount[]> {
    return [...this.accounts.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}

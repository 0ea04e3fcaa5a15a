import type { Pool } from 'pg';
import { ACCOUNT_KINDS, AccountKind, CreditAccount } from '../../domain/ledger/account.js';
import { AccountRepo } from '../../application/ledger/ports.js';
import { ConflictError, PersistenceError } from '../../application/errors.js';
import { isUniqueViolation, toPersistenceError } from './pgErrors.js';

type AccountRow = {
  account_id: string;
  name: string;
  kind: string;
  apr: string;
  credit_limit_cents: string | null;
  promo_rate_expires_at: Date | null;
  minimum_payment_cents: string | null;
  opened_at: Date;
};

const KNOWN_KINDS: ReadonlySet<string> = new Set<string>(ACCOUNT_KINDS);

function isAccountKind(value: string): value is AccountKind {
  return KNOWN_KINDS.has(value);
}

function toAccount(row: AccountRow): CreditAccount {
  if (!isAccountKind(row.kind)) {
    throw new PersistenceError(`Unknown account kind in catalogue: ${row.kind}`);
  }
  return {
    accountId: row.account_id,
    name: row.name,
    kind: row.kind,
    apr: Number(row.apr),
    creditLimitCents: row.credit_limit_cents === null ? null : Number(row.credit_limit_cents),
    promoRateExpiresAt: row.promo_rate_expires_at,
    minimumPaymentCents:
      row.minimum_payment_cents === null ? null : Number(row.minimum_payment_cents),
    openedAt: row.opened_at,
  };
}

const ACCOUNT_COLUMNS = `account_id, name, kind, apr, credit_limit_cents,
       promo_rate_expires_at, minimum_payment_cents, opened_at`;

export class PgAccountRepo implements AccountRepo {
  constructor(private readonly pool: Pool) {}

  async save(account: CreditAccount): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO accounts (
          account_id, name, kind, apr, credit_limit_cents,
          promo_rate_expires_at, minimum_payment_cents, opened_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        [
          account.accountId,
          account.name,
          account.kind,
          account.apr,
          account.creditLimitCents,
          account.promoRateExpiresAt,
          account.minimumPaymentCents,
          account.openedAt,
        ]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Account already exists: ${account.accountId}`);
      }
      throw toPersistenceError(error);
    }
  }

  async findById(accountId: string): Promise<CreditAccount | null> {
    try {
      const result = await this.pool.query<AccountRow>(
        `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE account_id = $1`,
        [accountId]
      );
      const row = result.rows[0];
      return row ? toAccount(row) : null;
    } catch (error) {
      throw toPersistenceError(error);
    }
  }

  async list(): Promise<CreditAccount[]> {
    try {
      const result = await this.pool.query<AccountRow>(
        `SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY name`
      );
      return result.rows.map(toAccount);
    } catch (error) {
      throw toPersistenceError(error);
    }
  }
}

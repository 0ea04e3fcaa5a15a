import { randomUUID } from 'crypto';
import { AccountKind, AccountLedger, CreditAccount, validateAccount } from '../../domain/ledger/account.js';
import { LedgerEvent } from '../../domain/ledger/events.js';
import { ValidationError } from '../../domain/ledger/errors.js';
import { ConflictError } from '../errors.js';
import { EventStore } from './eventStore.js';
import { AccountRepo } from './ports.js';

export interface OpenAccountCommand {
  accountId?: string;
  name: string;
  kind: AccountKind;
  apr: number;
  creditLimitCents: number | null;
  promoRateExpiresAt?: Date | null;
  minimumPaymentCents?: number | null;
  openedAt?: Date;
  /** Balance already owed when the account enters the ledger. */
  openingBalanceCents?: number;
}

export interface OpenAccountResult {
  account: CreditAccount;
  openingEvent: LedgerEvent | null;
}

/**
 * Register an account's terms in the catalogue. A non-zero opening balance
 * is written as the first event of the stream, an adjustment stamped at
 * `openedAt`.
 *
 * The catalogue and the log are separate stores. When the opening balance
 * could not be booked, re-running the same command finds the account with an
 * empty stream and books it then.
 */
export class OpenAccountUseCase {
  constructor(
    private accounts: AccountRepo,
    private eventStore: EventStore
  ) {}

  async execute(command: OpenAccountCommand): Promise<OpenAccountResult> {
    const account: CreditAccount = {
      accountId: command.accountId ?? randomUUID(),
      name: command.name,
      kind: command.kind,
      apr: command.apr,
      creditLimitCents: command.creditLimitCents,
      promoRateExpiresAt: command.promoRateExpiresAt ?? null,
      minimumPaymentCents: command.minimumPaymentCents ?? null,
      openedAt: command.openedAt ?? new Date(),
    };

    // Validate before touching storage (may throw ValidationError)
    validateAccount(account);
    const openingBalanceCents = command.openingBalanceCents ?? 0;
    if (!Number.isSafeInteger(openingBalanceCents)) {
      throw new ValidationError('Opening balance must be a whole number of cents');
    }

    let registered = account;
    try {
      await this.accounts.save(account);
    } catch (error) {
      if (!(error instanceof ConflictError) || openingBalanceCents === 0) {
        throw error;
      }
      registered = await this.unbookedAccount(command, error);
    }

    if (openingBalanceCents === 0) {
      return { account: registered, openingEvent: null };
    }

    const openingEvent = await this.eventStore.appendFromTail(registered.accountId, (tail) =>
      tail
        ? null
        : AccountLedger.open(registered).recordAdjustment(
            openingBalanceCents,
            registered.openedAt,
            `open:${registered.accountId}`,
            'Opening balance'
          )
    );
    if (!openingEvent) {
      throw new ConflictError(`Account already exists: ${registered.accountId}`);
    }
    return { account: registered, openingEvent };
  }

  /**
   * The stored account a retry may resume: same terms, nothing booked yet.
   * Anything else keeps the original conflict.
   */
  private async unbookedAccount(command: OpenAccountCommand, conflict: ConflictError): Promise<CreditAccount> {
    const existing = command.accountId ? await this.accounts.findById(command.accountId) : null;
    if (!existing || !sameTerms(existing, command)) {
      throw conflict;
    }
    if (await this.eventStore.tail(existing.accountId)) {
      throw conflict;
    }
    return existing;
  }
}

function sameTerms(account: CreditAccount, command: OpenAccountCommand): boolean {
  const sameDate = (a: Date | null, b: Date | null) => (a?.getTime() ?? null) === (b?.getTime() ?? null);
  return (
    account.name === command.name &&
    account.kind === command.kind &&
    account.apr === command.apr &&
    account.creditLimitCents === command.creditLimitCents &&
    account.minimumPaymentCents === (command.minimumPaymentCents ?? null) &&
    sameDate(account.promoRateExpiresAt, command.promoRateExpiresAt ?? null) &&
    (command.openedAt === undefined || sameDate(account.openedAt, command.openedAt))
  );
}

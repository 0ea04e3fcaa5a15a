import { CreditAccount } from '../ledger/account.js';

export function creditAccount(overrides: Partial<CreditAccount> & Pick<CreditAccount, 'accountId'>): CreditAccount {
  return {
    name: overrides.accountId,
    kind: 'revolving-credit',
    apr: 0.2,
    creditLimitCents: 1_000_000,
    promoRateExpiresAt: null,
    minimumPaymentCents: null,
    openedAt: new Date('2024-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

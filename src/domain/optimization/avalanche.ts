import { CreditAccount, minimumPaymentFor } from '../ledger/account.js';
import { ValidationError } from '../ledger/errors.js';

export interface PaymentAllocation {
  readonly accountId: string;
  readonly apr: number;
  readonly minimumCents: number;
  readonly extraCents: number;
  readonly totalCents: number;
  readonly remainingBalanceCents: number;
}

export interface UnmetMinimum {
  readonly accountId: string;
  readonly requiredCents: number;
  readonly allocatedCents: number;
  readonly shortfallCents: number;
}

export interface AvalanchePlan {
  readonly payments: PaymentAllocation[];
  /** Minimums the funds could not cover; empty when fully funded. */
  readonly unmetMinimums: UnmetMinimum[];
  readonly fullyFunded: boolean;
  readonly unallocatedCents: number;
}

interface Slot {
  account: CreditAccount;
  balanceCents: number;
  requiredCents: number;
  minimumCents: number;
  extraCents: number;
}

/**
 * Avalanche payment plan: minimums first, in rate order, then every remaining
 * cent to the highest-rate balance until it is cleared, cascading down.
 * When the funds do not cover every minimum the plan says which ones are unmet.
 */
export function allocateAvalanche(
  fundsCents: number,
  accounts: readonly CreditAccount[],
  balances: ReadonlyMap<string, number>
): AvalanchePlan {
  if (!Number.isSafeInteger(fundsCents) || fundsCents < 0) {
    throw new ValidationError('Available funds must be a non-negative whole number of cents');
  }

  const slots: Slot[] = accounts
    .map((account) => {
      const balanceCents = balances.get(account.accountId) ?? 0;
      return {
        account,
        balanceCents,
        requiredCents: minimumPaymentFor(account, balanceCents),
        minimumCents: 0,
        extraCents: 0,
      };
    })
    .filter((slot) => slot.balanceCents > 0)
    .sort(
      (a, b) =>
        b.account.apr - a.account.apr ||
        b.balanceCents - a.balanceCents ||
        a.account.accountId.localeCompare(b.account.accountId)
    );

  let remaining = fundsCents;

  for (const slot of slots) {
    slot.minimumCents = Math.min(slot.requiredCents, remaining);
    remaining -= slot.minimumCents;
  }

  for (const slot of slots) {
    if (remaining === 0) {
      break;
    }
    const outstanding = slot.balanceCents - slot.minimumCents;
    slot.extraCents = Math.min(outstanding, remaining);
    remaining -= slot.extraCents;
  }

  const unmetMinimums: UnmetMinimum[] = slots
    .filter((slot) => slot.minimumCents < slot.requiredCents)
    .map((slot) => ({
      accountId: slot.account.accountId,
      requiredCents: slot.requiredCents,
      allocatedCents: slot.minimumCents,
      shortfallCents: slot.requiredCents - slot.minimumCents,
    }));

  return {
    payments: slots.map((slot) => ({
      accountId: slot.account.accountId,
      apr: slot.account.apr,
      minimumCents: slot.minimumCents,
      extraCents: slot.extraCents,
      totalCents: slot.minimumCents + slot.extraCents,
      remainingBalanceCents: slot.balanceCents - slot.minimumCents - slot.extraCents,
    })),
    unmetMinimums,
    fullyFunded: unmetMinimums.length === 0,
    unallocatedCents: remaining,
  };
}

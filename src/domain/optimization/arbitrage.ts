import { CreditAccount } from '../ledger/account.js';
import { roundHalfAwayFromZero } from '../ledger/money.js';
import { RiskFactor, assessRisk, createDefaultRiskFactors } from './riskFactors.js';

/**
 * A balance transfer from a higher-rate to a lower-rate account.
 * Savings use simple interest on the moved balance: no compounding and no
 * minimum-payment offsets.
 */
export interface OptimizationOpportunity {
  readonly fromAccountId: string;
  readonly toAccountId: string;
  readonly transferAmountCents: number;
  readonly monthlySavingsCents: number;
  readonly annualSavingsCents: number;
  readonly rateDifferential: number;
  readonly riskScore: number;
  readonly riskFactors: Readonly<Record<string, number>>;
}

export interface ArbitrageOptions {
  /** Opportunities saving less than this per year are dropped. */
  minAnnualSavingsCents?: number;
  riskFactors?: readonly RiskFactor[];
  now?: Date;
}

export const DEFAULT_MIN_ANNUAL_SAVINGS_CENTS = 10000;

/**
 * Available room on an account, or null when it has no credit line.
 */
export function availableCapacityCents(account: CreditAccount, balanceCents: number): number | null {
  if (account.creditLimitCents === null) {
    return null;
  }
  return Math.max(0, account.creditLimitCents - balanceCents);
}

/**
 * Every (source, destination) pair where moving the source balance onto the
 * destination's free credit lowers the rate paid, sorted by annual savings
 * (highest first), then by risk (lowest first).
 */
export function findArbitrageOpportunities(
  accounts: readonly CreditAccount[],
  balances: ReadonlyMap<string, number>,
  options: ArbitrageOptions = {}
): OptimizationOpportunity[] {
  const minAnnualSavingsCents = options.minAnnualSavingsCents ?? DEFAULT_MIN_ANNUAL_SAVINGS_CENTS;
  const riskFactors = options.riskFactors ?? createDefaultRiskFactors();
  const now = options.now ?? new Date();
  const opportunities: OptimizationOpportunity[] = [];

  for (const source of accounts) {
    const sourceBalanceCents = balances.get(source.accountId) ?? 0;
    if (sourceBalanceCents <= 0) {
      continue;
    }

    for (const destination of accounts) {
      if (destination.accountId === source.accountId || source.apr <= destination.apr) {
        continue;
      }

      const destinationBalanceCents = balances.get(destination.accountId) ?? 0;
      const capacity = availableCapacityCents(destination, destinationBalanceCents);
      if (!capacity) {
        continue;
      }

      const transferAmountCents = Math.min(sourceBalanceCents, capacity);
      const rateDifferential = source.apr - destination.apr;
      const monthlyExact = (transferAmountCents * rateDifferential) / 12;
      const annualSavingsCents = roundHalfAwayFromZero(monthlyExact * 12);

      if (annualSavingsCents < minAnnualSavingsCents) {
        continue;
      }

      const risk = assessRisk(riskFactors, {
        source,
        destination,
        sourceBalanceCents,
        destinationBalanceCents,
        transferAmountCents,
        rateDifferential,
        now,
      });

      opportunities.push({
        fromAccountId: source.accountId,
        toAccountId: destination.accountId,
        transferAmountCents,
        monthlySavingsCents: roundHalfAwayFromZero(monthlyExact),
        annualSavingsCents,
        rateDifferential,
        riskScore: risk.score,
        riskFactors: risk.factors,
      });
    }
  }

  return opportunities.sort(compareOpportunities);
}

export function compareOpportunities(a: OptimizationOpportunity, b: OptimizationOpportunity): number {
  return (
    b.annualSavingsCents - a.annualSavingsCents ||
    a.riskScore - b.riskScore ||
    a.fromAccountId.localeCompare(b.fromAccountId) ||
    a.toAccountId.localeCompare(b.toAccountId)
  );
}

import { CreditAccount } from '../ledger/account.js';

export type Phase = 'CRISIS' | 'RECOVERY' | 'GROWTH';

export const CRISIS_DEBT_TO_INCOME = 2.0;
export const CRISIS_UTILIZATION = 0.8;
export const RECOVERY_DEBT_TO_INCOME = 0.5;

/**
 * What each phase allows the optimizer to propose.
 */
export interface PhaseStrategy {
  readonly strategies: readonly ('avalanche' | 'arbitrage')[];
  /** Opportunities riskier than this are withheld. */
  readonly maxArbitrageRisk: number;
}

export const PHASE_STRATEGIES: Readonly<Record<Phase, PhaseStrategy>> = {
  CRISIS: { strategies: ['avalanche', 'arbitrage'], maxArbitrageRisk: 0.4 },
  RECOVERY: { strategies: ['avalanche', 'arbitrage'], maxArbitrageRisk: 0.7 },
  GROWTH: { strategies: ['arbitrage', 'avalanche'], maxArbitrageRisk: 1 },
};

function ratio(numerator: number, denominator: number): number {
  if (denominator > 0) {
    return numerator / denominator;
  }
  return numerator > 0 ? Number.POSITIVE_INFINITY : 0;
}

/**
 * CRISIS when debt is at least twice income or credit is at least 80% used
 * (both boundaries inclusive), RECOVERY when debt exceeds half of income,
 * GROWTH otherwise.
 */
export function classify(
  totalDebt: number,
  annualIncome: number,
  creditUsed: number,
  creditAvailable: number
): Phase {
  const debtToIncome = ratio(totalDebt, annualIncome);
  const utilization = ratio(creditUsed, creditAvailable);

  if (debtToIncome >= CRISIS_DEBT_TO_INCOME || utilization >= CRISIS_UTILIZATION) {
    return 'CRISIS';
  }
  if (debtToIncome > RECOVERY_DEBT_TO_INCOME) {
    return 'RECOVERY';
  }
  return 'GROWTH';
}

export interface PortfolioFigures {
  totalDebtCents: number;
  creditUsedCents: number;
  creditLimitCents: number;
}

/**
 * Debt and credit-line usage over a set of balances. Credit balances (negative)
 * count as zero debt.
 */
export function portfolioFigures(
  accounts: readonly CreditAccount[],
  balances: ReadonlyMap<string, number>
): PortfolioFigures {
  let totalDebtCents = 0;
  let creditUsedCents = 0;
  let creditLimitCents = 0;

  for (const account of accounts) {
    const owed = Math.max(0, balances.get(account.accountId) ?? 0);
    totalDebtCents += owed;
    if (account.creditLimitCents !== null) {
      creditUsedCents += owed;
      creditLimitCents += account.creditLimitCents;
    }
  }

  return { totalDebtCents, creditUsedCents, creditLimitCents };
}

export function classifyPortfolio(
  accounts: readonly CreditAccount[],
  balances: ReadonlyMap<string, number>,
  annualIncomeCents: number
): Phase {
  const figures = portfolioFigures(accounts, balances);
  return classify(
    figures.totalDebtCents,
    annualIncomeCents,
    figures.creditUsedCents,
    figures.creditLimitCents
  );
}

import { CreditAccount } from '../ledger/account.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Everything a risk factor may look at for one candidate transfer.
 */
export interface RiskInput {
  readonly source: CreditAccount;
  readonly destination: CreditAccount;
  readonly sourceBalanceCents: number;
  readonly destinationBalanceCents: number;
  readonly transferAmountCents: number;
  readonly rateDifferential: number;
  readonly now: Date;
}

/**
 * A named, weighted contribution to an opportunity's risk score.
 * `score` may return anything; the engine clamps it to [0, 1].
 */
export interface RiskFactor {
  readonly name: string;
  readonly weight: number;
  score(input: RiskInput): number;
}

export interface RiskFactorSettings {
  /** Spread at which a transfer is considered to carry no margin risk. */
  comfortableSpread: number;
  /** Transfer size treated as full exposure. */
  exposureReferenceCents: number;
  /** Horizon over which an expiring promotional rate stops mattering. */
  promoHorizonDays: number;
}

export const DEFAULT_RISK_SETTINGS: RiskFactorSettings = {
  comfortableSpread: 0.25,
  exposureReferenceCents: 5_000_000,
  promoHorizonDays: 365,
};

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) {
    return 1;
  }
  return Math.min(1, Math.max(0, value));
}

export function createDefaultRiskFactors(
  settings: RiskFactorSettings = DEFAULT_RISK_SETTINGS
): RiskFactor[] {
  return [
    {
      // Thin spreads leave little room for fees or rate changes
      name: 'rateDifferential',
      weight: 0.4,
      score: ({ rateDifferential }) => 1 - rateDifferential / settings.comfortableSpread,
    },
    {
      name: 'balanceExposure',
      weight: 0.2,
      score: ({ transferAmountCents }) => transferAmountCents / settings.exposureReferenceCents,
    },
    {
      // Utilization of the destination after the transfer; near the limit a
      // single charge can trigger the penalty rate
      name: 'limitProximity',
      weight: 0.3,
      score: ({ destination, destinationBalanceCents, transferAmountCents }) =>
        destination.creditLimitCents
          ? (destinationBalanceCents + transferAmountCents) / destination.creditLimitCents
          : 1,
    },
    {
      name: 'promoExpiry',
      weight: 0.1,
      score: ({ destination, now }) => {
        if (!destination.promoRateExpiresAt) {
          return 0;
        }
        const daysRemaining = (destination.promoRateExpiresAt.getTime() - now.getTime()) / DAY_MS;
        return 1 - daysRemaining / settings.promoHorizonDays;
      },
    },
  ];
}

export interface RiskAssessment {
  score: number;
  factors: Record<string, number>;
}

/**
 * Weighted mean of the clamped factor scores, so the result stays in [0, 1]
 * whatever weights are registered.
 */
export function assessRisk(factors: readonly RiskFactor[], input: RiskInput): RiskAssessment {
  const totalWeight = factors.reduce((sum, factor) => sum + factor.weight, 0);
  const scores: Record<string, number> = {};
  let weighted = 0;

  for (const factor of factors) {
    const score = clampUnit(factor.score(input));
    scores[factor.name] = score;
    weighted += factor.weight * score;
  }

  return {
    score: totalWeight > 0 ? clampUnit(weighted / totalWeight) : 0,
    factors: scores,
  };
}

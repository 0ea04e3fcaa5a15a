import { describe, it, expect } from 'vitest';
import { findArbitrageOpportunities, availableCapacityCents } from '../arbitrage.js';
import { RiskFactor, assessRisk, clampUnit } from '../riskFactors.js';
import { creditAccount } from '../../__tests__/fixtures.js';

const now = new Date('2024-06-01T00:00:00.000Z');

describe('findArbitrageOpportunities', () => {
  const rewards = creditAccount({ accountId: 'rewards', apr: 0.2499, creditLimitCents: 1_000_000 });
  const creditUnion = creditAccount({
    accountId: 'credit-union',
    kind: 'home-equity-line',
    apr: 0.04,
    creditLimitCents: 2_000_000,
  });

  it('should compute simple-interest savings on the moved balance', () => {
    const balances = new Map([
      ['rewards', 833182],
      ['credit-union', 0],
    ]);

    const [opportunity, ...rest] = findArbitrageOpportunities([rewards, creditUnion], balances, { now });

    expect(rest).toEqual([]);
    expect(opportunity).toMatchObject({
      fromAccountId: 'rewards',
      toAccountId: 'credit-union',
      transferAmountCents: 833182,
      monthlySavingsCents: 14574,
      annualSavingsCents: 174885,
    });
    expect(opportunity?.rateDifferential).toBeCloseTo(0.2099, 10);
  });

  it('should weigh the default risk factors', () => {
    const balances = new Map([['rewards', 833182]]);
    const [opportunity] = findArbitrageOpportunities([rewards, creditUnion], balances, { now });

    expect(opportunity?.riskFactors.rateDifferential).toBeCloseTo(0.1604, 6);
    expect(opportunity?.riskFactors.balanceExposure).toBeCloseTo(0.1666364, 6);
    expect(opportunity?.riskFactors.limitProximity).toBeCloseTo(0.416591, 6);
    expect(opportunity?.riskFactors.promoExpiry).toBe(0);
    expect(opportunity?.riskScore).toBeCloseTo(0.2224646, 6);
  });

  it('should cap the transfer at the destination capacity', () => {
    const balances = new Map([
      ['rewards', 833182],
      ['credit-union', 1_500_000],
    ]);
    const [opportunity] = findArbitrageOpportunities([rewards, creditUnion], balances, { now });
    expect(opportunity?.transferAmountCents).toBe(500000);
  });

  it('should drop opportunities below the savings threshold', () => {
    const balances = new Map([['rewards', 40000]]);
    // 40000 * 0.2099 = 8396 cents a year
    expect(findArbitrageOpportunities([rewards, creditUnion], balances, { now })).toEqual([]);
    expect(
      findArbitrageOpportunities([rewards, creditUnion], balances, { now, minAnnualSavingsCents: 8000 })
    ).toHaveLength(1);
  });

  it('should never move balance onto an account without a credit line', () => {
    const loan = creditAccount({ accountId: 'loan', kind: 'installment-loan', apr: 0.03, creditLimitCents: null });
    const balances = new Map([['rewards', 833182]]);
    expect(availableCapacityCents(loan, 0)).toBeNull();
    expect(findArbitrageOpportunities([rewards, loan], balances, { now })).toEqual([]);
  });

  it('should sort by annual savings, highest first', () => {
    // store->rewards only fits 166818 cents at a 5% spread: 8341 a year, dropped
    const store = creditAccount({ accountId: 'store', apr: 0.2999, creditLimitCents: 300000 });
    const balances = new Map([
      ['rewards', 833182],
      ['store', 200000],
    ]);

    const opportunities = findArbitrageOpportunities([rewards, store, creditUnion], balances, { now });

    expect(opportunities.map((o) => `${o.fromAccountId}->${o.toAccountId}`)).toEqual([
      'rewards->credit-union',
      'store->credit-union',
    ]);
  });
});

describe('assessRisk', () => {
  const input = {
    source: creditAccount({ accountId: 'a' }),
    destination: creditAccount({ accountId: 'b' }),
    sourceBalanceCents: 1000,
    destinationBalanceCents: 0,
    transferAmountCents: 1000,
    rateDifferential: 0.1,
    now,
  };

  it('should clamp factor scores into [0, 1]', () => {
    const factors: RiskFactor[] = [
      { name: 'high', weight: 1, score: () => 7 },
      { name: 'low', weight: 1, score: () => -3 },
    ];
    expect(assessRisk(factors, input)).toEqual({ score: 0.5, factors: { high: 1, low: 0 } });
  });

  it('should treat a NaN score as maximum risk', () => {
    expect(clampUnit(Number.NaN)).toBe(1);
  });

  it('should score zero without factors', () => {
    expect(assessRisk([], input).score).toBe(0);
  });
});

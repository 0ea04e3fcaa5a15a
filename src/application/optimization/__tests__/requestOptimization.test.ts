import { describe, it, expect, beforeEach } from 'vitest';
import { createInMemoryRepositories, createServices, LedgerServices } from '../../../infra/container.js';
import { ValidationError } from '../../../domain/ledger/errors.js';

const asOf = new Date('2024-06-01T00:00:00.000Z');
const opened = new Date('2024-01-01T00:00:00.000Z');

async function openPortfolio(services: LedgerServices, creditUnionApr: number, creditUnionLimitCents: number) {
  await services.openAccount.execute({
    accountId: 'rewards',
    name: 'Rewards Card',
    kind: 'revolving-credit',
    apr: 0.2499,
    creditLimitCents: 1_000_000,
    openedAt: opened,
    openingBalanceCents: 833182,
  });
  await services.openAccount.execute({
    accountId: 'credit-union',
    name: 'Credit Union Line',
    kind: 'home-equity-line',
    apr: creditUnionApr,
    creditLimitCents: creditUnionLimitCents,
    openedAt: opened,
  });
}

describe('RequestOptimizationUseCase', () => {
  let services: LedgerServices;

  beforeEach(() => {
    services = createServices(createInMemoryRepositories());
  });

  it('should propose the transfer and the payoff plan in GROWTH', async () => {
    await openPortfolio(services, 0.04, 2_000_000);

    const report = await services.optimization.execute({
      annualIncomeCents: 2_000_000,
      availableFundsCents: 100000,
      asOf,
    });

    expect(report.phase).toBe('GROWTH');
    expect(report.figures).toEqual({
      totalDebtCents: 833182,
      creditUsedCents: 833182,
      creditLimitCents: 3_000_000,
    });
    expect(report.opportunities).toHaveLength(1);
    expect(report.opportunities[0]).toMatchObject({
      fromAccountId: 'rewards',
      toAccountId: 'credit-union',
      annualSavingsCents: 174885,
    });
    expect(report.withheldCount).toBe(0);
    expect(report.plan.payments).toEqual([
      {
        accountId: 'rewards',
        apr: 0.2499,
        minimumCents: 16664,
        extraCents: 83336,
        totalCents: 100000,
        remainingBalanceCents: 733182,
      },
    ]);
    expect(report.alerts.map((a) => [a.kind, a.severity, a.subject])).toEqual([
      ['HIGH_UTILIZATION', 'WARNING', 'rewards'],
      ['ARBITRAGE_AVAILABLE', 'INFO', 'rewards'],
    ]);
    expect(report.alerts[1]?.message).toBe(
      'Moving 8331.82 from Rewards Card to Credit Union Line saves 145.74/month (1748.85/year)'
    );
  });

  it('should withhold risky transfers in CRISIS', async () => {
    await openPortfolio(services, 0.15, 900_000);

    const report = await services.optimization.execute({
      annualIncomeCents: 300_000,
      availableFundsCents: 100000,
      asOf,
    });

    expect(report.phase).toBe('CRISIS');
    expect(report.strategy.maxArbitrageRisk).toBe(0.4);
    expect(report.opportunities).toEqual([]);
    expect(report.withheldCount).toBe(1);
    expect(report.alerts.map((a) => a.kind)).toEqual(['FINANCIAL_CRISIS', 'HIGH_UTILIZATION']);
  });

  it('should flag minimums the funds cannot cover', async () => {
    await openPortfolio(services, 0.04, 2_000_000);

    const report = await services.optimization.execute({
      annualIncomeCents: 2_000_000,
      availableFundsCents: 10000,
      asOf,
    });

    expect(report.plan.unmetMinimums).toEqual([
      { accountId: 'rewards', requiredCents: 16664, allocatedCents: 10000, shortfallCents: 6664 },
    ]);
    expect(report.alerts.map((a) => a.kind)).toEqual([
      'MINIMUM_PAYMENT_UNMET',
      'HIGH_UTILIZATION',
      'ARBITRAGE_AVAILABLE',
    ]);
  });

  it('should reject a negative income', async () => {
    await expect(
      services.optimization.execute({ annualIncomeCents: -1, availableFundsCents: 0 })
    ).rejects.toThrow(ValidationError);
  });
});

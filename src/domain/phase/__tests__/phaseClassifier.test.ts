import { describe, it, expect } from 'vitest';
import { classify, classifyPortfolio, portfolioFigures } from '../phaseClassifier.js';
import { creditAccount } from '../../__tests__/fixtures.js';

describe('classify', () => {
  it('should be CRISIS at a debt-to-income of exactly 2', () => {
    expect(classify(200, 100, 0, 100)).toBe('CRISIS');
    expect(classify(199, 100, 0, 100)).toBe('RECOVERY');
  });

  it('should be CRISIS at a utilization of exactly 0.8', () => {
    expect(classify(0, 100, 80, 100)).toBe('CRISIS');
    expect(classify(0, 100, 79, 100)).toBe('GROWTH');
  });

  it('should need a debt-to-income above 0.5 for RECOVERY', () => {
    expect(classify(50, 100, 0, 100)).toBe('GROWTH');
    expect(classify(51, 100, 0, 100)).toBe('RECOVERY');
  });

  it('should treat debt without income as CRISIS', () => {
    expect(classify(1, 0, 0, 0)).toBe('CRISIS');
  });

  it('should treat no debt and no income as GROWTH', () => {
    expect(classify(0, 0, 0, 0)).toBe('GROWTH');
  });
});

describe('classifyPortfolio', () => {
  const card = creditAccount({ accountId: 'card', creditLimitCents: 100000 });
  const loan = creditAccount({ accountId: 'loan', kind: 'installment-loan', creditLimitCents: null });

  it('should count only credit lines toward utilization', () => {
    const balances = new Map([
      ['card', 40000],
      ['loan', 500000],
      ['unknown', 999],
    ]);
    expect(portfolioFigures([card, loan], balances)).toEqual({
      totalDebtCents: 540000,
      creditUsedCents: 40000,
      creditLimitCents: 100000,
    });
  });

  it('should ignore credit balances', () => {
    const balances = new Map([['card', -5000]]);
    expect(portfolioFigures([card], balances).totalDebtCents).toBe(0);
  });

  it('should classify from the derived figures', () => {
    const balances = new Map([
      ['card', 85000],
      ['loan', 0],
    ]);
    expect(classifyPortfolio([card, loan], balances, 10_000_000)).toBe('CRISIS');
  });
});

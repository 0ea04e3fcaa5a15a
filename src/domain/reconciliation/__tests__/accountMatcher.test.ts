import { describe, it, expect } from 'vitest';
import { levenshtein, matchAccount, similarity } from '../accountMatcher.js';
import { creditAccount } from '../../__tests__/fixtures.js';

describe('levenshtein', () => {
  it('should count single-character edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('same', 'same')).toBe(0);
  });
});

describe('similarity', () => {
  it('should ignore case and punctuation', () => {
    expect(similarity('EVERYDAY-visa!', 'Everyday Visa')).toBe(1);
  });
});

describe('matchAccount', () => {
  const accounts = [
    creditAccount({ accountId: 'acc-visa', name: 'Everyday Visa' }),
    creditAccount({ accountId: 'acc-heloc', name: 'Home Equity Line', kind: 'home-equity-line' }),
  ];

  it('should resolve an exact id', () => {
    expect(matchAccount('acc-heloc', accounts)).toEqual({
      status: 'matched',
      accountId: 'acc-heloc',
      score: 1,
      method: 'id',
    });
  });

  it('should resolve a normalized name', () => {
    expect(matchAccount('EVERYDAY visa', accounts)).toEqual({
      status: 'matched',
      accountId: 'acc-visa',
      score: 1,
      method: 'name',
    });
  });

  it('should resolve a single fuzzy match above the threshold', () => {
    const match = matchAccount('Everyday Visaa', accounts);
    expect(match.status).toBe('matched');
    if (match.status === 'matched') {
      expect(match.accountId).toBe('acc-visa');
      expect(match.method).toBe('fuzzy');
      expect(match.score).toBeCloseTo(1 - 1 / 14, 10);
    }
  });

  it('should hand a weak match to review', () => {
    const match = matchAccount('Everyday', accounts);
    expect(match.status).toBe('needs_review');
    if (match.status === 'needs_review') {
      expect(match.candidates.map((c) => c.accountId)).toEqual(['acc-visa']);
      expect(match.candidates[0]?.score).toBeCloseTo(1 - 5 / 13, 10);
    }
  });

  it('should hand two confident matches to review', () => {
    const twins = [
      creditAccount({ accountId: 'visa-4', name: 'Visa 1234' }),
      creditAccount({ accountId: 'visa-5', name: 'Visa 1235' }),
    ];
    const match = matchAccount('Visa 123', twins);
    expect(match.status).toBe('needs_review');
    if (match.status === 'needs_review') {
      expect(match.candidates.map((c) => c.accountId)).toEqual(['visa-4', 'visa-5']);
    }
  });

  it('should report nothing above the candidate floor as not found', () => {
    expect(matchAccount('zzzz', accounts)).toEqual({ status: 'not_found' });
  });
});

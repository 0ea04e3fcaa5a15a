import { CreditAccount } from '../ledger/account.js';

export interface MatchCandidate {
  readonly accountId: string;
  readonly name: string;
  readonly score: number;
}

export type AccountMatch =
  | { status: 'matched'; accountId: string; score: number; method: 'id' | 'name' | 'fuzzy' }
  | { status: 'needs_review'; candidates: MatchCandidate[] }
  | { status: 'not_found' };

export interface MatchOptions {
  /** Minimum similarity for a fuzzy match to resolve on its own. */
  threshold?: number;
  /** Candidates below this score are not worth showing to a reviewer. */
  candidateFloor?: number;
}

export const DEFAULT_MATCH_THRESHOLD = 0.85;
export const DEFAULT_CANDIDATE_FLOOR = 0.5;

export function normalizeReference(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function levenshtein(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  if (a.length === 0) {
    return b.length;
  }
  if (b.length === 0) {
    return a.length;
  }

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * 1 for identical references, 0 for nothing in common: one minus the edit
 * distance over the longer normalized string.
 */
export function similarity(a: string, b: string): number {
  const left = normalizeReference(a);
  const right = normalizeReference(b);
  const longest = Math.max(left.length, right.length);
  if (longest === 0) {
    return 0;
  }
  return 1 - levenshtein(left, right) / longest;
}

/**
 * Resolve a statement's account reference. Exact id and exact name resolve
 * directly; a fuzzy match resolves only when it alone clears the threshold.
 * Anything weaker is handed to a reviewer rather than guessed.
 */
export function matchAccount(
  reference: string,
  accounts: readonly CreditAccount[],
  options: MatchOptions = {}
): AccountMatch {
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
  const floor = options.candidateFloor ?? DEFAULT_CANDIDATE_FLOOR;

  const byId = accounts.find((account) => account.accountId === reference);
  if (byId) {
    return { status: 'matched', accountId: byId.accountId, score: 1, method: 'id' };
  }

  const normalized = normalizeReference(reference);
  const byName = accounts.filter((account) => normalizeReference(account.name) === normalized);
  if (byName.length === 1 && byName[0]) {
    return { status: 'matched', accountId: byName[0].accountId, score: 1, method: 'name' };
  }

  const candidates = accounts
    .map((account) => ({
      accountId: account.accountId,
      name: account.name,
      score: similarity(reference, account.name),
    }))
    .filter((candidate) => candidate.score >= floor)
    .sort((a, b) => b.score - a.score || a.accountId.localeCompare(b.accountId));

  if (candidates.length === 0) {
    return { status: 'not_found' };
  }

  const confident = candidates.filter((candidate) => candidate.score >= threshold);
  const [best] = confident;
  if (confident.length === 1 && best) {
    return { status: 'matched', accountId: best.accountId, score: best.score, method: 'fuzzy' };
  }

  return { status: 'needs_review', candidates };
}

/**
 * History-based categorizer.
 *
 * Matching order:
 * 1. Transaction already carries a category → kept (`preset`)
 * 2. Exact description-key match → rule category (`exact`)
 * 3. Best fuzzy key above the threshold → rule category (`fuzzy`)
 * 4. Optional: the category printed by the source (`source`)
 * 5. Otherwise category stays null (`none`)
 *
 * Never throws on data; an uncategorized transaction is a normal outcome.
 */

import { MATCHING_DEFAULTS, type CategoryRule, type Transaction } from '@ledger/types';
import { descriptionKey } from './description-key.js';
import { buildCategoryRules, compareRecency } from './rules.js';
import { keySimilarity } from './similarity.js';

export interface CategorizerOptions {
  /** Minimum fuzzy similarity, 0..1 (default 0.6) */
  threshold?: number;
  /** Minimum common substring length for a fuzzy candidate (default 4) */
  minMatchLength?: number;
  /** Use the source's own category when history has no match (default false) */
  fallbackToSourceCategory?: boolean;
}

export type MatchKind = 'exact' | 'fuzzy' | 'preset' | 'source' | 'none';

export interface CategoryMatch {
  kind: MatchKind;
  key: string;
  category: string | null;
  similarity: number;
  rule: CategoryRule | null;
}

export interface CategorizationOutcome {
  transaction: Transaction;
  match: CategoryMatch;
}

interface Candidate {
  rule: CategoryRule;
  similarity: number;
}

// Higher similarity, then the more frequent category, then the more recent one.
function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.similarity !== b.similarity) return b.similarity - a.similarity;
  if (a.rule.count !== b.rule.count) return b.rule.count - a.rule.count;
  const recency = compareRecency(b.rule, a.rule);
  if (recency !== 0) return recency;
  return a.rule.key.localeCompare(b.rule.key);
}

export class HistoryCategorizer {
  private readonly rules: readonly CategoryRule[];
  private readonly byKey: ReadonlyMap<string, CategoryRule>;
  private readonly threshold: number;
  private readonly minMatchLength: number;
  private readonly fallbackToSourceCategory: boolean;

  constructor(rules: readonly CategoryRule[], options: CategorizerOptions = {}) {
    const threshold = options.threshold ?? MATCHING_DEFAULTS.THRESHOLD;
    const minMatchLength = options.minMatchLength ?? MATCHING_DEFAULTS.MIN_MATCH_LENGTH;
    if (!(threshold > 0 && threshold <= 1)) {
      throw new RangeError(`threshold must be in (0, 1], got ${threshold}`);
    }
    if (!Number.isInteger(minMatchLength) || minMatchLength < 1) {
      throw new RangeError(`minMatchLength must be a positive integer, got ${minMatchLength}`);
    }

    this.rules = [...rules].sort((a, b) => a.key.localeCompare(b.key));
    this.byKey = new Map(this.rules.map((rule) => [rule.key, rule]));
    this.threshold = threshold;
    this.minMatchLength = minMatchLength;
    this.fallbackToSourceCategory = options.fallbackToSourceCategory ?? false;
  }

  static fromHistory(history: readonly Transaction[], options: CategorizerOptions = {}): HistoryCategorizer {
    return new HistoryCategorizer(buildCategoryRules(history), options);
  }

  get ruleCount(): number {
    return this.rules.length;
  }

  match(description: string): CategoryMatch {
    const key = descriptionKey(description);
    if (key === '') {
      return { kind: 'none', key, category: null, similarity: 0, rule: null };
    }

    const exact = this.byKey.get(key);
    if (exact !== undefined) {
      return { kind: 'exact', key, category: exact.category, similarity: 1, rule: exact };
    }

    let best: Candidate | null = null;
    for (const rule of this.rules) {
      const { similarity, commonLength } = keySimilarity(key, rule.key);
      if (commonLength < this.minMatchLength || similarity < this.threshold) continue;

      const candidate = { rule, similarity };
      if (best === null || compareCandidates(candidate, best) < 0) {
        best = candidate;
      }
    }

    if (best !== null) {
      return { kind: 'fuzzy', key, category: best.rule.category, similarity: best.similarity, rule: best.rule };
    }
    return { kind: 'none', key, category: null, similarity: 0, rule: null };
  }

  categorizeOne(transaction: Transaction): CategorizationOutcome {
    if (transaction.category !== null) {
      return {
        transaction: { ...transaction },
        match: {
          kind: 'preset',
          key: descriptionKey(transaction.description),
          category: transaction.category,
          similarity: 0,
          rule: null,
        },
      };
    }

    let match = this.match(transaction.description);
    const sourceCategory = transaction.sourceCategory ?? null;
    if (match.kind === 'none' && this.fallbackToSourceCategory && sourceCategory !== null) {
      match = { ...match, kind: 'source', category: sourceCategory };
    }

    return { transaction: { ...transaction, category: match.category }, match };
  }

  categorizeAll(transactions: readonly Transaction[]): CategorizationOutcome[] {
    return transactions.map((tx) => this.categorizeOne(tx));
  }
}

export function categorizeWithDetails(
  transactions: readonly Transaction[],
  history: readonly Transaction[],
  options: CategorizerOptions = {}
): CategorizationOutcome[] {
  return HistoryCategorizer.fromHistory(history, options).categorizeAll(transactions);
}

export function categorize(
  transactions: readonly Transaction[],
  history: readonly Transaction[],
  options: CategorizerOptions = {}
): Transaction[] {
  return categorizeWithDetails(transactions, history, options).map((outcome) => outcome.transaction);
}

/**
 * Category rules learned from history rows a human has categorized.
 */

import type { CategoryRule, Transaction } from '@ledger/types';
import { descriptionKey } from './description-key.js';

interface CategoryTally {
  category: string;
  count: number;
  lastSeen: string;
  lastIndex: number;
}

export interface CategoryConflict {
  key: string;
  categories: Array<{ category: string; count: number }>;
}

export const REFERENCE_COLUMNS = ['Key', 'Category', 'Occurrences', 'Last Seen'] as const;

export type ReferenceRow = Array<string | number>;

/**
 * Later date wins; on the same date the row further down the sheet wins.
 */
export function compareRecency(
  a: { lastSeen: string; lastIndex: number },
  b: { lastSeen: string; lastIndex: number }
): number {
  if (a.lastSeen !== b.lastSeen) return a.lastSeen < b.lastSeen ? -1 : 1;
  return a.lastIndex - b.lastIndex;
}

// Most frequent, then most recent, then alphabetical.
function compareTallies(a: CategoryTally, b: CategoryTally): number {
  if (a.count !== b.count) return b.count - a.count;
  const recency = compareRecency(b, a);
  if (recency !== 0) return recency;
  return a.category.localeCompare(b.category);
}

function tallyHistory(history: readonly Transaction[]): Map<string, Map<string, CategoryTally>> {
  const byKey = new Map<string, Map<string, CategoryTally>>();

  history.forEach((tx, index) => {
    const category = tx.category?.trim() ?? '';
    if (category === '') return;

    const key = descriptionKey(tx.description);
    if (key === '') return;

    let tallies = byKey.get(key);
    if (tallies === undefined) {
      tallies = new Map();
      byKey.set(key, tallies);
    }

    const existing = tallies.get(category);
    if (existing === undefined) {
      tallies.set(category, { category, count: 1, lastSeen: tx.date, lastIndex: index });
      return;
    }

    existing.count += 1;
    if (compareRecency({ lastSeen: tx.date, lastIndex: index }, existing) > 0) {
      existing.lastSeen = tx.date;
      existing.lastIndex = index;
    }
  });

  return byKey;
}

export function buildCategoryRules(history: readonly Transaction[]): CategoryRule[] {
  const rules: CategoryRule[] = [];

  for (const [key, tallies] of tallyHistory(history)) {
    const ranked = Array.from(tallies.values()).sort(compareTallies);
    const winner = ranked[0];
    if (winner === undefined) continue;

    rules.push({
      key,
      category: winner.category,
      count: winner.count,
      totalCount: ranked.reduce((sum, t) => sum + t.count, 0),
      lastSeen: winner.lastSeen,
      lastIndex: winner.lastIndex,
    });
  }

  return rules.sort((a, b) => a.key.localeCompare(b.key));
}

/**
 * Keys that history maps to more than one category. Not an error: the majority
 * still wins, but the sheet owner may want to clean these up.
 */
export function findCategoryConflicts(history: readonly Transaction[]): CategoryConflict[] {
  const conflicts: CategoryConflict[] = [];

  for (const [key, tallies] of tallyHistory(history)) {
    if (tallies.size < 2) continue;
    conflicts.push({
      key,
      categories: Array.from(tallies.values())
        .sort(compareTallies)
        .map(({ category, count }) => ({ category, count })),
    });
  }

  return conflicts.sort((a, b) => a.key.localeCompare(b.key));
}

export function toReferenceTable(rules: readonly CategoryRule[]): ReferenceRow[] {
  return [
    [...REFERENCE_COLUMNS],
    ...rules.map((rule) => [rule.key, rule.category, rule.count, rule.lastSeen]),
  ];
}

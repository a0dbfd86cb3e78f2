import { describe, it, expect } from 'vitest';
import { buildCategoryRules, findCategoryConflicts, toReferenceTable } from '@ledger/categorizer';
import { tx } from './helpers.js';

const amazonHistory = [
  tx('AMZN MKTPLACE', 'Shopping', '2024-01-05'),
  tx('AMZN MKTPLACE', 'Shopping', '2024-02-05'),
  tx('AMZN MKTPLACE', 'Shopping', '2024-03-05'),
  tx('AMZN MKTPLACE', 'Gifts', '2024-03-20'),
];

describe('buildCategoryRules', () => {
  it('should pick the majority category for a key', () => {
    expect(buildCategoryRules(amazonHistory)).toEqual([
      { key: 'amzn mktplace', category: 'Shopping', count: 3, totalCount: 4, lastSeen: '2024-03-05', lastIndex: 2 },
    ]);
  });

  it('should break count ties by the most recent date', () => {
    const rules = buildCategoryRules([
      tx('UBER TRIP', 'Travel', '2024-02-10'),
      tx('UBER TRIP', 'Transport', '2024-01-10'),
    ]);
    expect(rules[0]?.category).toBe('Travel');
  });

  it('should break same-day ties by the later row', () => {
    const rules = buildCategoryRules([
      tx('UBER TRIP', 'Travel', '2024-02-10'),
      tx('UBER TRIP', 'Transport', '2024-02-10'),
    ]);
    expect(rules[0]).toMatchObject({ category: 'Transport', lastIndex: 1 });
  });

  it('should ignore uncategorized rows and empty keys', () => {
    const rules = buildCategoryRules([
      tx('AMZN MKTPLACE', null),
      tx('AMZN MKTPLACE', '  '),
      tx('12/03 0001', 'Fees'),
    ]);
    expect(rules).toEqual([]);
  });

  it('should merge descriptions that share a key and sort rules by key', () => {
    const rules = buildCategoryRules([
      tx('Padaria São João 3/10', 'Food'),
      tx('PADARIA SAO JOAO', 'Food'),
      tx('AMZN MKTPLACE 12/03', 'Shopping'),
    ]);
    expect(rules.map((r) => [r.key, r.count])).toEqual([
      ['amzn mktplace', 1],
      ['padaria sao joao', 2],
    ]);
  });
});

describe('findCategoryConflicts', () => {
  it('should list keys with more than one category, majority first', () => {
    expect(findCategoryConflicts([...amazonHistory, tx('NETFLIX.COM', 'Entertainment')])).toEqual([
      {
        key: 'amzn mktplace',
        categories: [
          { category: 'Shopping', count: 3 },
          { category: 'Gifts', count: 1 },
        ],
      },
    ]);
  });
});

describe('toReferenceTable', () => {
  it('should render a header and one row per rule', () => {
    expect(toReferenceTable(buildCategoryRules(amazonHistory))).toEqual([
      ['Key', 'Category', 'Occurrences', 'Last Seen'],
      ['amzn mktplace', 'Shopping', 3, '2024-03-05'],
    ]);
  });
});

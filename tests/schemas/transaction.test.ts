import { describe, it, expect } from 'vitest';
import { CategoryRuleSchema, RawRecordSchema, SourceIdSchema, TransactionSchema } from '@ledger/types';

const validTransaction = {
  date: '2024-02-01',
  description: 'Coffee Shop',
  amount: -4.5,
  account: 'checking-csv',
  category: null,
};

describe('TransactionSchema', () => {
  it('should accept a transaction with a null category', () => {
    expect(TransactionSchema.safeParse(validTransaction).success).toBe(true);
  });

  it('should accept the optional owner, source category and country', () => {
    const result = TransactionSchema.safeParse({
      ...validTransaction,
      category: 'Food',
      owner: 'Ana',
      sourceCategory: 'Restaurantes',
      country: 'BR',
    });
    expect(result.success).toBe(true);
  });

  it('should reject a non-ISO date', () => {
    const result = TransactionSchema.safeParse({ ...validTransaction, date: '01/02/2024' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Date must be in YYYY-MM-DD format');
    }
  });

  it('should reject an empty description and a non-finite amount', () => {
    expect(TransactionSchema.safeParse({ ...validTransaction, description: '' }).success).toBe(false);
    expect(TransactionSchema.safeParse({ ...validTransaction, amount: Number.NaN }).success).toBe(false);
  });

  it('should reject an empty category string', () => {
    expect(TransactionSchema.safeParse({ ...validTransaction, category: '' }).success).toBe(false);
  });
});

describe('SourceIdSchema', () => {
  it('should accept kebab-case ids only', () => {
    expect(SourceIdSchema.safeParse('bank-extract-csv').success).toBe(true);
    expect(SourceIdSchema.safeParse('Card CSV').success).toBe(false);
    expect(SourceIdSchema.safeParse('card--csv').success).toBe(false);
  });
});

describe('RawRecordSchema', () => {
  it('should keep amounts and dates as strings', () => {
    const result = RawRecordSchema.safeParse({
      sourceId: 'card-invoice',
      lineNumber: 8,
      date: '28/12',
      description: 'PADARIA SAO JOAO',
      amount: '12,50',
      yearHint: 2024,
      closingMonth: 1,
      originalText: '28/12 PADARIA SAO JOAO BR R$ 12,50',
    });
    expect(result.success).toBe(true);
  });

  it('should reject a closing month outside 1-12', () => {
    const result = RawRecordSchema.safeParse({
      sourceId: 'card-invoice',
      lineNumber: 1,
      date: '28/12',
      description: 'x',
      amount: '1',
      closingMonth: 13,
      originalText: 'x',
    });
    expect(result.success).toBe(false);
  });
});

describe('CategoryRuleSchema', () => {
  it('should require positive counts', () => {
    const rule = { key: 'amzn mktplace', category: 'Shopping', count: 3, totalCount: 4, lastSeen: '2024-03-01', lastIndex: 5 };
    expect(CategoryRuleSchema.safeParse(rule).success).toBe(true);
    expect(CategoryRuleSchema.safeParse({ ...rule, count: 0 }).success).toBe(false);
  });
});

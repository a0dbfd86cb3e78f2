import { describe, it, expect } from 'vitest';
import { NormalizationError, UnsupportedSourceError, type RawRecord } from '@ledger/types';
import { cleanDescription, normalize, normalizeAll, parse } from '@ledger/parsers';
import { loadFixture } from '../fixtures/index.js';

function checkingRecord(overrides: Partial<RawRecord> = {}): RawRecord {
  return {
    sourceId: 'checking-csv',
    lineNumber: 2,
    date: '01/02/2024',
    description: 'Coffee Shop',
    amount: '4.50',
    type: 'Debit',
    originalText: '01/02/2024,Coffee Shop,4.50,Debit',
    ...overrides,
  };
}

function normalizationError(fn: () => unknown): NormalizationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof NormalizationError) return error;
    throw error;
  }
  throw new Error('expected a NormalizationError');
}

describe('normalize', () => {
  it('should turn a checking debit into a negative transaction', () => {
    const file = { fileName: 'checking.csv', content: 'Date,Desc,Amount,Type\n01/02/2024,Coffee Shop,4.50,Debit\n' };
    const [raw] = parse(file, 'checking-csv');
    expect(raw).toBeDefined();
    if (raw === undefined) return;

    expect(normalize(raw, 'checking-csv')).toEqual({
      date: '2024-02-01',
      description: 'Coffee Shop',
      amount: -4.5,
      account: 'checking-csv',
      category: null,
      owner: null,
      sourceCategory: null,
    });
  });

  it('should read the type flag case- and accent-insensitively', () => {
    expect(normalize(checkingRecord({ type: 'Credit' }), 'checking-csv').amount).toBe(4.5);
    expect(normalize(checkingRecord({ type: ' debit ' }), 'checking-csv').amount).toBe(-4.5);
    expect(normalize(checkingRecord({ type: 'Débito' }), 'checking-csv').amount).toBe(-4.5);
  });

  it('should make expenses negative for every sign convention', () => {
    const checking = normalizeAll(parse(loadFixture('checking-csv.csv'), 'checking-csv'), 'checking-csv');
    const card = normalizeAll(parse(loadFixture('card-csv.csv'), 'card-csv'), 'card-csv');
    const bank = normalizeAll(parse(loadFixture('bank-extract-csv.csv'), 'bank-extract-csv'), 'bank-extract-csv');

    expect(checking.map((t) => t.amount)).toEqual([-4.5, 3200, -87.35]);
    expect(card.map((t) => t.amount)).toEqual([-59.9, -39.9, 20]);
    expect(bank.map((t) => t.amount)).toEqual([1500, -245.67]);
  });

  it('should produce a date, amount and account for every built-in fixture', () => {
    const fixtures: Array<[string, string]> = [
      ['checking-csv.csv', 'checking-csv'],
      ['card-csv.csv', 'card-csv'],
      ['bank-extract-csv.csv', 'bank-extract-csv'],
      ['card-invoice.txt', 'card-invoice'],
      ['bb-credit-card.txt', 'bb-credit-card'],
    ];
    for (const [name, sourceId] of fixtures) {
      const transactions = normalizeAll(parse(loadFixture(name), sourceId), sourceId);
      expect(transactions.length).toBeGreaterThan(0);
      for (const tx of transactions) {
        expect(tx.date).toMatch(/^\d{4}-\d{2}-\d{2}$/);
        expect(Number.isFinite(tx.amount)).toBe(true);
        expect(tx.account).toBe(sourceId);
      }
    }
  });

  it('should place day/month invoice dates in the right year', () => {
    const transactions = normalizeAll(parse(loadFixture('card-invoice.txt'), 'card-invoice'), 'card-invoice', {
      owner: 'Ana',
    });

    expect(transactions).toEqual([
      {
        date: '2023-12-28',
        description: 'PADARIA SAO JOAO',
        amount: -12.5,
        account: 'card-invoice',
        category: null,
        owner: 'Ana',
        sourceCategory: 'Restaurantes',
        country: 'BR',
      },
      {
        date: '2024-01-03',
        description: 'RESTAURANTE SABOR',
        amount: -80,
        account: 'card-invoice',
        category: null,
        owner: 'Ana',
        sourceCategory: 'Restaurantes',
        country: 'BR',
      },
      {
        date: '2024-01-05',
        description: 'ESTORNO LOJA X',
        amount: 40,
        account: 'card-invoice',
        category: null,
        owner: 'Ana',
        sourceCategory: 'Refunds',
        country: 'BR',
      },
    ]);
  });

  it('should normalize SISBB invoices', () => {
    const transactions = normalizeAll(parse(loadFixture('bb-credit-card.txt'), 'bb-credit-card'), 'bb-credit-card');
    expect(transactions.map((t) => t.date)).toEqual(['2024-03-05', '2024-03-12', '2024-03-15']);
    expect(transactions.map((t) => t.amount)).toEqual([-12.5, -55.9, 10]);
    expect(transactions.map((t) => t.country)).toEqual(['BR', 'US', 'BR']);
  });

  it('should never produce negative zero', () => {
    const raw = { sourceId: 'card-csv', lineNumber: 2, date: '2024-03-02', description: 'Card check', amount: '0.00', originalText: '' };
    expect(Object.is(normalize(raw, 'card-csv').amount, 0)).toBe(true);
  });

  it('should clean descriptions and keep their case', () => {
    const tx = normalize(checkingRecord({ description: '  Padaria\tSão   João\u0000 ' }), 'checking-csv');
    expect(tx.description).toBe('Padaria São João');
  });

  it('should be deterministic and leave the raw record untouched', () => {
    const raw = checkingRecord();
    const copy = { ...raw };
    expect(normalize(raw, 'checking-csv')).toEqual(normalize(raw, 'checking-csv'));
    expect(raw).toEqual(copy);
  });
});

describe('normalize errors', () => {
  it('should reject impossible dates', () => {
    const error = normalizationError(() => normalize(checkingRecord({ date: '31/02/2024' }), 'checking-csv'));
    expect(error.field).toBe('date');
    expect(error.value).toBe('31/02/2024');
    expect(error.lineNumber).toBe(2);
    expect(error.message).toBe('[checking-csv] line 2: invalid date "31/02/2024" (Not a calendar date: 31/02/2024)');
  });

  it('should reject unparsable amounts', () => {
    const error = normalizationError(() => normalize(checkingRecord({ amount: 'four fifty' }), 'checking-csv'));
    expect(error.field).toBe('amount');
    expect(error.message).toBe(
      '[checking-csv] line 2: invalid amount "four fifty" (Unable to parse amount: four fifty)'
    );
  });

  it('should reject unknown debit/credit flags', () => {
    const error = normalizationError(() => normalize(checkingRecord({ type: 'Transfer' }), 'checking-csv'));
    expect(error.field).toBe('type');
    expect(error.message).toBe('[checking-csv] line 2: invalid type "Transfer" (unknown debit/credit flag)');
  });

  it('should reject empty descriptions', () => {
    const error = normalizationError(() => normalize(checkingRecord({ description: ' \t ' }), 'checking-csv'));
    expect(error.field).toBe('description');
  });

  it('should reject unknown sources', () => {
    expect(() => normalize(checkingRecord(), 'paper-ledger')).toThrow(UnsupportedSourceError);
  });
});

describe('cleanDescription', () => {
  it('should collapse whitespace and drop control characters', () => {
    expect(cleanDescription('UBER\r\n  *TRIP ')).toBe('UBER *TRIP');
  });
});

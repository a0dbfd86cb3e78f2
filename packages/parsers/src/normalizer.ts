/**
 * Normalizer: RawRecord → Transaction.
 *
 * Applies the source's date format, decimal separator and sign convention so
 * that money leaving the account is always negative. Pure: the same record and
 * source always produce the same transaction.
 */

import {
  NormalizationError,
  TransactionSchema,
  parseAmount,
  parseStatementDate,
  roundToTwoDecimals,
  type NormalizationField,
  type RawRecord,
  type Transaction,
} from '@ledger/types';
import { defaultRegistry, type ParserRegistry } from './registry.js';
import type { NormalizationRules, StatementSource } from './types.js';

export interface NormalizeOptions {
  owner?: string | null;
}

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

export function cleanDescription(description: string): string {
  return description.normalize('NFC').replace(CONTROL_CHARS, ' ').replace(/\s+/g, ' ').trim();
}

export function foldTypeFlag(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .toLowerCase();
}

function fail(raw: RawRecord, field: NormalizationField, value: string, reason: string): never {
  throw new NormalizationError({
    sourceId: raw.sourceId,
    lineNumber: raw.lineNumber,
    field,
    value,
    reason,
  });
}

function normalizeDate(raw: RawRecord, rules: NormalizationRules): string {
  try {
    return parseStatementDate(raw.date, rules.dateFormat, {
      yearHint: raw.yearHint,
      referenceMonth: raw.closingMonth,
    });
  } catch (error) {
    return fail(raw, 'date', raw.date, error instanceof Error ? error.message : String(error));
  }
}

function applySignConvention(raw: RawRecord, rules: NormalizationRules, value: number): number {
  switch (rules.signConvention) {
    case 'signed':
      return value;
    case 'expense-positive':
      return -value;
    case 'type-column': {
      const flag = foldTypeFlag(raw.type ?? '');
      if (rules.debitTypes?.includes(flag) === true) return -Math.abs(value);
      if (rules.creditTypes?.includes(flag) === true) return Math.abs(value);
      return fail(raw, 'type', raw.type ?? '', 'unknown debit/credit flag');
    }
  }
}

function normalizeAmount(raw: RawRecord, rules: NormalizationRules): number {
  let value: number;
  try {
    value = parseAmount(raw.amount, rules.decimalSeparator);
  } catch (error) {
    return fail(raw, 'amount', raw.amount, error instanceof Error ? error.message : String(error));
  }

  const signed = applySignConvention(raw, rules, value);
  const rounded = roundToTwoDecimals(signed);
  // -0 would print as "-0.00"
  return rounded === 0 ? 0 : rounded;
}

export function normalizeRecord(raw: RawRecord, source: StatementSource, options: NormalizeOptions = {}): Transaction {
  const date = normalizeDate(raw, source.rules);
  const amount = normalizeAmount(raw, source.rules);
  const description = cleanDescription(raw.description);
  if (description === '') {
    fail(raw, 'description', raw.description, 'empty description');
  }

  const sourceCategory = raw.category !== undefined ? cleanDescription(raw.category) : '';
  const country = raw.country?.trim().toUpperCase();

  const candidate: Transaction = {
    date,
    description,
    amount,
    account: source.id,
    category: null,
    owner: options.owner ?? null,
    sourceCategory: sourceCategory !== '' ? sourceCategory : null,
    ...(country !== undefined && /^[A-Z]{2}$/.test(country) ? { country } : {}),
  };

  const result = TransactionSchema.safeParse(candidate);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path[0];
    return fail(
      raw,
      field === 'date' || field === 'amount' || field === 'type' ? field : 'description',
      raw.originalText,
      issue?.message ?? 'invalid transaction'
    );
  }
  return result.data;
}

export function normalize(
  raw: RawRecord,
  sourceId: string,
  registry: ParserRegistry = defaultRegistry,
  options: NormalizeOptions = {}
): Transaction {
  return normalizeRecord(raw, registry.get(sourceId), options);
}

export function normalizeAll(
  records: RawRecord[],
  sourceId: string,
  options: NormalizeOptions & { registry?: ParserRegistry } = {}
): Transaction[] {
  const source = (options.registry ?? defaultRegistry).get(sourceId);
  return records.map((raw) => normalizeRecord(raw, source, options));
}

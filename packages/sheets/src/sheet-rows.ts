/**
 * Mapping between worksheet rows and Transactions.
 *
 * Header names are matched case-insensitively and the Portuguese headers of
 * older sheets (Data, Descrição, Valor, Conta, Categoria, Quem) are accepted.
 */

import {
  SHEET_COLUMNS,
  SourceIdSchema,
  StoreError,
  TransactionSchema,
  parseAmount,
  parseLooseDate,
  roundToTwoDecimals,
  toISODate,
  type Transaction,
} from '@ledger/types';
import type { CellValue } from './spreadsheet-api.js';

export type SheetField = 'date' | 'description' | 'amount' | 'account' | 'category' | 'owner';

export type ColumnMap = Record<SheetField, number | null>;

export const REQUIRED_FIELDS: readonly SheetField[] = ['date', 'description', 'amount', 'category'];

// Account cells that are not a source id (typed by hand) are read under this id.
export const MANUAL_ACCOUNT = 'manual';

const HEADER_ALIASES: Record<SheetField, readonly string[]> = {
  date: ['date', 'data'],
  description: ['description', 'descricao', 'desc'],
  amount: ['amount', 'valor', 'value'],
  account: ['account', 'conta'],
  category: ['category', 'categoria'],
  owner: ['owner', 'quem', 'who'],
};

export interface SkippedRow {
  rowNumber: number;
  reason: string;
}

function foldHeader(value: CellValue): string {
  return String(value ?? '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .toLowerCase();
}

export function mapHeader(header: readonly CellValue[]): ColumnMap {
  const folded = header.map(foldHeader);
  const find = (field: SheetField): number | null => {
    const index = folded.findIndex((cell) => HEADER_ALIASES[field].includes(cell));
    return index >= 0 ? index : null;
  };
  return {
    date: find('date'),
    description: find('description'),
    amount: find('amount'),
    account: find('account'),
    category: find('category'),
    owner: find('owner'),
  };
}

export function missingRequiredColumns(columns: ColumnMap): SheetField[] {
  return REQUIRED_FIELDS.filter((field) => columns[field] === null);
}

function cellText(row: readonly CellValue[], index: number | null): string {
  if (index === null) return '';
  const value = row[index];
  return value === null || value === undefined ? '' : String(value).trim();
}

/**
 * Sheets serial dates count days from 1899-12-30.
 */
function serialToISODate(serial: number): string {
  const date = new Date(Date.UTC(1899, 11, 30) + Math.floor(serial) * 86_400_000);
  return toISODate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

function readDate(value: CellValue | undefined): string | null {
  if (typeof value === 'number') return serialToISODate(value);
  if (typeof value !== 'string') return null;
  return parseLooseDate(value);
}

function readAmount(value: CellValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? roundToTwoDecimals(value) : null;
  if (typeof value !== 'string' || value.trim() === '') return null;
  // "1.234,56" or "4,50" use a decimal comma; anything else a decimal point
  const decimal = value.lastIndexOf(',') > value.lastIndexOf('.') ? ',' : '.';
  try {
    return roundToTwoDecimals(parseAmount(value, decimal));
  } catch {
    return null;
  }
}

function isBlankRow(row: readonly CellValue[]): boolean {
  return row.every((cell) => cell === null || String(cell).trim() === '');
}

/**
 * Converts worksheet values (header in the first row) into Transactions.
 * Rows without a readable date, amount or description are skipped and reported.
 */
export function rowsToTransactions(values: readonly CellValue[][]): {
  transactions: Transaction[];
  skipped: SkippedRow[];
} {
  const [header, ...rows] = values;
  if (header === undefined || rows.length === 0) {
    return { transactions: [], skipped: [] };
  }

  const columns = mapHeader(header);
  const missing = missingRequiredColumns(columns);
  if (missing.length > 0) {
    throw new StoreError('readHistory', `Worksheet is missing required columns: ${missing.join(', ')}`);
  }

  const transactions: Transaction[] = [];
  const skipped: SkippedRow[] = [];

  rows.forEach((row, i) => {
    const rowNumber = i + 2;
    if (isBlankRow(row)) return;

    const date = readDate(columns.date !== null ? row[columns.date] : undefined);
    if (date === null) {
      skipped.push({ rowNumber, reason: 'unreadable date' });
      return;
    }

    const amount = readAmount(columns.amount !== null ? row[columns.amount] : undefined);
    if (amount === null) {
      skipped.push({ rowNumber, reason: 'unreadable amount' });
      return;
    }

    const accountText = cellText(row, columns.account);
    const category = cellText(row, columns.category);
    const owner = cellText(row, columns.owner);

    const parsed = TransactionSchema.safeParse({
      date,
      description: cellText(row, columns.description),
      amount,
      account: SourceIdSchema.safeParse(accountText).success ? accountText : MANUAL_ACCOUNT,
      category: category !== '' ? category : null,
      owner: owner !== '' ? owner : null,
    });

    if (parsed.success) {
      transactions.push(parsed.data);
    } else {
      skipped.push({ rowNumber, reason: parsed.error.issues[0]?.message ?? 'invalid row' });
    }
  });

  return { transactions, skipped };
}

export function defaultColumnMap(): ColumnMap {
  return mapHeader([...SHEET_COLUMNS]);
}

/**
 * Lays a transaction out under an existing header so appended rows line up with
 * whatever column order the worksheet already uses.
 */
export function transactionToRow(tx: Transaction, columns: ColumnMap = defaultColumnMap(), width?: number): CellValue[] {
  const indexes = Object.values(columns).filter((index): index is number => index !== null);
  const rowWidth = width ?? Math.max(...indexes) + 1;
  const row: CellValue[] = new Array<CellValue>(rowWidth).fill('');

  const put = (index: number | null, value: CellValue): void => {
    if (index !== null) row[index] = value;
  };

  put(columns.date, tx.date);
  put(columns.description, tx.description);
  put(columns.amount, tx.amount);
  put(columns.account, tx.account);
  put(columns.category, tx.category ?? '');
  put(columns.owner, tx.owner ?? '');

  return row;
}

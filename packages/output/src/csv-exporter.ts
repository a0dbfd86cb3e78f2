/**
 * CSV Exporter Module
 *
 * Writes categorized transactions as CSV for review before (or instead of)
 * appending them to the sheet.
 */

import { formatBRL, formatBrazilianDate, formatDecimal, sumAmounts, type Transaction } from '@ledger/types';

/**
 * Options for CSV export
 */
export interface CsvExportOptions {
  /** Include header row (default: true) */
  includeHeader?: boolean;
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Append a TOTAL row with the sum of amounts (default: false) */
  includeTotal?: boolean;
  /** Include the country column (default: when any transaction has a country) */
  includeCountry?: boolean;
  /** 'decimal' (1234.56) or 'brl' (1.234,56) (default: 'decimal') */
  amountFormat?: 'decimal' | 'brl';
  /** Date format: 'iso' (YYYY-MM-DD) or 'br' (DD/MM/YYYY) (default: 'iso') */
  dateFormat?: 'iso' | 'br';
}

type ResolvedOptions = Required<CsvExportOptions>;

const TOTAL_LABEL = 'TOTAL';

/**
 * Escape a value for CSV (handles quotes and delimiters)
 */
export function escapeCsvValue(value: string | number | null | undefined, delimiter: string): string {
  if (value === null || value === undefined) {
    return '';
  }

  const str = String(value);
  const needsQuoting = str.includes(delimiter) ||
                       str.includes('"') ||
                       str.includes('\n') ||
                       str.includes('\r');

  if (needsQuoting) {
    return `"${str.replace(/"/g, '""')}"`;
  }

  return str;
}

function formatDate(isoDate: string, format: 'iso' | 'br'): string {
  return format === 'br' ? formatBrazilianDate(isoDate) : isoDate;
}

function formatAmount(amount: number, format: 'decimal' | 'brl'): string {
  return format === 'brl' ? formatBRL(amount) : formatDecimal(amount);
}

function buildHeaderRow(options: ResolvedOptions): string[] {
  const headers = ['date', 'owner', 'description', 'category'];
  if (options.includeCountry) {
    headers.push('country');
  }
  headers.push('account', 'amount');
  return headers;
}

function buildDataRow(tx: Transaction, options: ResolvedOptions): string[] {
  const row = [
    formatDate(tx.date, options.dateFormat),
    tx.owner ?? '',
    tx.description,
    tx.category ?? '',
  ];
  if (options.includeCountry) {
    row.push(tx.country ?? '');
  }
  row.push(tx.account, formatAmount(tx.amount, options.amountFormat));
  return row;
}

function buildTotalRow(transactions: readonly Transaction[], options: ResolvedOptions): string[] {
  const total = sumAmounts(transactions.map((tx) => tx.amount));
  const row = ['', '', TOTAL_LABEL, ''];
  if (options.includeCountry) {
    row.push('');
  }
  row.push('', formatAmount(total, options.amountFormat));
  return row;
}

function rowToCsvLine(row: string[], delimiter: string): string {
  return row.map(value => escapeCsvValue(value, delimiter)).join(delimiter);
}

function resolveOptions(transactions: readonly Transaction[], options: CsvExportOptions): ResolvedOptions {
  return {
    includeHeader: options.includeHeader ?? true,
    delimiter: options.delimiter ?? ',',
    includeTotal: options.includeTotal ?? false,
    includeCountry: options.includeCountry ?? transactions.some((tx) => tx.country !== undefined),
    amountFormat: options.amountFormat ?? 'decimal',
    dateFormat: options.dateFormat ?? 'iso',
  };
}

/**
 * Export transactions to CSV, sorted by date (ties keep input order).
 */
export function exportCsv(
  transactions: readonly Transaction[],
  options: CsvExportOptions = {}
): string {
  const opts = resolveOptions(transactions, options);
  const lines: string[] = [];

  if (opts.includeHeader) {
    lines.push(rowToCsvLine(buildHeaderRow(opts), opts.delimiter));
  }

  const sorted = [...transactions].sort((a, b) => a.date.localeCompare(b.date));
  for (const tx of sorted) {
    lines.push(rowToCsvLine(buildDataRow(tx, opts), opts.delimiter));
  }

  if (opts.includeTotal) {
    lines.push(rowToCsvLine(buildTotalRow(sorted, opts), opts.delimiter));
  }

  return lines.join('\n');
}

/**
 * Result of split-by-account export
 */
export interface SplitCsvResult {
  account: string;
  /** Suggested filename, e.g. 'card-csv.csv' */
  filename: string;
  transactionCount: number;
  content: string;
}

/**
 * Export one CSV per account, in order of first appearance.
 */
export function exportCsvByAccount(
  transactions: readonly Transaction[],
  options: CsvExportOptions = {}
): SplitCsvResult[] {
  const byAccount = new Map<string, Transaction[]>();
  for (const tx of transactions) {
    const group = byAccount.get(tx.account);
    if (group === undefined) {
      byAccount.set(tx.account, [tx]);
    } else {
      group.push(tx);
    }
  }

  return [...byAccount.entries()].map(([account, group]) => ({
    account,
    filename: `${account}.csv`,
    transactionCount: group.length,
    content: exportCsv(group, options),
  }));
}

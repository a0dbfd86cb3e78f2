/**
 * In-memory stand-ins for development, dry runs and tests.
 */

import type { AppendResult, Transaction, TransactionStore } from '@ledger/types';
import type { CellValue, SpreadsheetApi } from './spreadsheet-api.js';

interface ParsedRange {
  title: string;
  startRow: number;
}

/**
 * Understands the ranges the store builds: `'Title'!A:Z`, `'Title'!1:1`, `'Title'!A1`.
 */
export function parseRange(range: string): ParsedRange {
  const match = /^'((?:[^']|'')*)'!(.*)$/.exec(range);
  if (match === null) {
    throw new Error(`Unsupported range: ${range}`);
  }
  const title = (match[1] ?? '').replace(/''/g, "'");
  const start = /^[A-Z]*(\d+)/.exec(match[2] ?? '');
  return { title, startRow: start?.[1] !== undefined ? parseInt(start[1], 10) : 1 };
}

function columnLetter(count: number): string {
  let n = count;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters === '' ? 'A' : letters;
}

function isBlank(row: CellValue[] | undefined): boolean {
  return row === undefined || row.every((cell) => cell === null || cell === '');
}

export class InMemorySpreadsheetApi implements SpreadsheetApi {
  private sheets: Map<string, CellValue[][]> = new Map();
  /** Every call, in order, as `method range` */
  readonly calls: string[] = [];

  constructor(
    private readonly title = 'In-memory ledger',
    initial: Record<string, CellValue[][]> = {}
  ) {
    for (const [name, rows] of Object.entries(initial)) {
      this.sheets.set(name, rows.map((row) => [...row]));
    }
  }

  async getTitle(): Promise<string> {
    this.calls.push('getTitle');
    return this.title;
  }

  async listWorksheets(): Promise<string[]> {
    this.calls.push('listWorksheets');
    return [...this.sheets.keys()];
  }

  async addWorksheet(title: string): Promise<void> {
    this.calls.push(`addWorksheet ${title}`);
    if (this.sheets.has(title)) {
      throw new Error(`A sheet with the name "${title}" already exists`);
    }
    this.sheets.set(title, []);
  }

  async getValues(range: string): Promise<CellValue[][]> {
    this.calls.push(`getValues ${range}`);
    const { title, startRow } = parseRange(range);
    const rows = this.sheetOrThrow(title);
    const selected = /!\d+:\d+$/.test(range) ? rows.slice(startRow - 1, startRow) : rows.slice(startRow - 1);
    return selected.map((row) => [...row]);
  }

  async appendValues(range: string, values: CellValue[][]): Promise<string | null> {
    this.calls.push(`appendValues ${range}`);
    const { title } = parseRange(range);
    const rows = this.sheetOrThrow(title);
    while (rows.length > 0 && isBlank(rows[rows.length - 1])) {
      rows.pop();
    }
    const first = rows.length + 1;
    for (const row of values) {
      rows.push([...row]);
    }
    const width = Math.max(1, ...values.map((row) => row.length));
    return `'${title}'!A${first}:${columnLetter(width)}${rows.length}`;
  }

  async updateValues(range: string, values: CellValue[][]): Promise<void> {
    this.calls.push(`updateValues ${range}`);
    const { title, startRow } = parseRange(range);
    const rows = this.sheetOrThrow(title);
    values.forEach((row, i) => {
      rows[startRow - 1 + i] = [...row];
    });
    for (let i = 0; i < rows.length; i++) {
      rows[i] ??= [];
    }
  }

  async clearValues(range: string): Promise<void> {
    this.calls.push(`clearValues ${range}`);
    const { title } = parseRange(range);
    this.sheetOrThrow(title);
    this.sheets.set(title, []);
  }

  /** Snapshot of a worksheet's rows */
  rows(title: string): CellValue[][] {
    return (this.sheets.get(title) ?? []).map((row) => [...row]);
  }

  private sheetOrThrow(title: string): CellValue[][] {
    const rows = this.sheets.get(title);
    if (rows === undefined) {
      throw new Error(`Unable to parse range: '${title}'`);
    }
    return rows;
  }
}

/**
 * Keeps transactions in an array. `--dry-run` reads history from the real sheet
 * but never writes, so this store mostly serves tests.
 */
export class InMemoryTransactionStore implements TransactionStore {
  private transactions: Transaction[];

  constructor(history: Transaction[] = []) {
    this.transactions = [...history];
  }

  async readHistory(): Promise<Transaction[]> {
    return [...this.transactions];
  }

  async appendTransactions(transactions: Transaction[]): Promise<AppendResult> {
    if (transactions.length === 0) {
      return { appended: 0, range: null };
    }
    const first = this.transactions.length + 2;
    this.transactions.push(...transactions);
    return { appended: transactions.length, range: `A${first}:F${this.transactions.length + 1}` };
  }

  all(): Transaction[] {
    return [...this.transactions];
  }

  clear(): void {
    this.transactions = [];
  }
}

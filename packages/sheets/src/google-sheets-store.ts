/**
 * TransactionStore backed by a Google Sheets worksheet.
 */

import {
  SHEET_COLUMNS,
  StoreError,
  errorMessage,
  isLedgerError,
  type AppendResult,
  type Transaction,
  type TransactionStore,
} from '@ledger/types';
import { DEFAULT_REFERENCE_WORKSHEET, DEFAULT_WORKSHEET } from './client.js';
import { mapHeader, missingRequiredColumns, rowsToTransactions, transactionToRow, type SkippedRow } from './sheet-rows.js';
import { a1Range, type CellValue, type SpreadsheetApi } from './spreadsheet-api.js';

const ALL_COLUMNS = 'A:Z';

export interface SheetsStoreOptions {
  worksheet?: string;
  referenceWorksheet?: string;
  /** Called once per sheet row that could not be read as a transaction */
  onWarning?: (message: string) => void;
}

async function wrap<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isLedgerError(err)) throw err;
    throw new StoreError(operation, errorMessage(err), { cause: err });
  }
}

export class GoogleSheetsTransactionStore implements TransactionStore {
  readonly worksheet: string;
  readonly referenceWorksheet: string;
  private readonly onWarning: ((message: string) => void) | undefined;

  constructor(
    private readonly api: SpreadsheetApi,
    options: SheetsStoreOptions = {}
  ) {
    this.worksheet = options.worksheet ?? DEFAULT_WORKSHEET;
    this.referenceWorksheet = options.referenceWorksheet ?? DEFAULT_REFERENCE_WORKSHEET;
    this.onWarning = options.onWarning;
  }

  /**
   * Creates the worksheet when the spreadsheet does not have it yet.
   * Returns true when a worksheet was created.
   */
  async ensureWorksheet(title: string): Promise<boolean> {
    return wrap('ensureWorksheet', async () => {
      const titles = await this.api.listWorksheets();
      if (titles.includes(title)) return false;
      await this.api.addWorksheet(title);
      return true;
    });
  }

  async readHistory(): Promise<Transaction[]> {
    const { transactions, skipped } = await this.readHistoryDetailed();
    for (const row of skipped) {
      this.onWarning?.(`${this.worksheet} row ${row.rowNumber} skipped: ${row.reason}`);
    }
    return transactions;
  }

  async readHistoryDetailed(): Promise<{ transactions: Transaction[]; skipped: SkippedRow[] }> {
    return wrap('readHistory', async () => {
      const titles = await this.api.listWorksheets();
      if (!titles.includes(this.worksheet)) {
        return { transactions: [], skipped: [] };
      }
      const values = await this.api.getValues(a1Range(this.worksheet, ALL_COLUMNS));
      return rowsToTransactions(values);
    });
  }

  async appendTransactions(transactions: Transaction[]): Promise<AppendResult> {
    if (transactions.length === 0) {
      return { appended: 0, range: null };
    }

    return wrap('appendTransactions', async () => {
      await this.ensureWorksheet(this.worksheet);
      const existing = await this.api.getValues(a1Range(this.worksheet, '1:1'));
      const header = existing[0] ?? [];
      const hasHeader = header.some((cell) => cell !== null && String(cell).trim() !== '');

      const rows: CellValue[][] = [];
      if (hasHeader) {
        const columns = mapHeader(header);
        const missing = missingRequiredColumns(columns);
        if (missing.length > 0) {
          throw new StoreError('appendTransactions', `Worksheet is missing required columns: ${missing.join(', ')}`);
        }
        for (const tx of transactions) {
          rows.push(transactionToRow(tx, columns, header.length));
        }
      } else {
        rows.push([...SHEET_COLUMNS]);
        for (const tx of transactions) {
          rows.push(transactionToRow(tx));
        }
      }

      const range = await this.api.appendValues(a1Range(this.worksheet, ALL_COLUMNS), rows);
      return { appended: transactions.length, range };
    });
  }

  /**
   * Replaces the contents of a worksheet with `rows`, starting at A1.
   * Returns the number of rows written.
   */
  async writeReferenceTable(rows: CellValue[][], title: string = this.referenceWorksheet): Promise<number> {
    return wrap('writeReferenceTable', async () => {
      await this.ensureWorksheet(title);
      await this.api.clearValues(a1Range(title, ALL_COLUMNS));
      if (rows.length > 0) {
        await this.api.updateValues(a1Range(title, 'A1'), rows);
      }
      return rows.length;
    });
  }
}

/**
 * @ledger/sheets
 * Google Sheets storage for the transaction history and the category reference table.
 */

export {
  SPREADSHEETS_SCOPE,
  DEFAULT_WORKSHEET,
  DEFAULT_REFERENCE_WORKSHEET,
  SheetsConfigSchema,
  getSheetsConfig,
  isSheetsConfigured,
  createSpreadsheetApi,
  testConnection,
} from './client.js';
export type { SheetsConfig } from './client.js';

export { GoogleSpreadsheetApi, VALUE_READ_OPTIONS, a1Range, toCellValue } from './spreadsheet-api.js';
export type { CellValue, SpreadsheetApi } from './spreadsheet-api.js';

export {
  MANUAL_ACCOUNT,
  REQUIRED_FIELDS,
  mapHeader,
  missingRequiredColumns,
  rowsToTransactions,
  transactionToRow,
  defaultColumnMap,
} from './sheet-rows.js';
export type { SheetField, ColumnMap, SkippedRow } from './sheet-rows.js';

export { GoogleSheetsTransactionStore } from './google-sheets-store.js';
export type { SheetsStoreOptions } from './google-sheets-store.js';

export { InMemorySpreadsheetApi, InMemoryTransactionStore, parseRange } from './in-memory-store.js';

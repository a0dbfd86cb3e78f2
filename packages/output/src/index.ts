/**
 * Output module - CSV export and run summaries.
 */

export {
  exportCsv,
  exportCsvByAccount,
  escapeCsvValue,
  type CsvExportOptions,
  type SplitCsvResult,
} from './csv-exporter.js';

export { formatImportSummary, formatReconciliation } from './summary.js';

/**
 * @ledger/importer
 * Batch import: statement files in, categorized rows appended to the store.
 */

export { runImport, failureKind } from './pipeline.js';
export type {
  ImportFailure,
  ImportFailureKind,
  ImportOptions,
  ImportResult,
  ImportSummary,
  FileImport,
} from './pipeline.js';

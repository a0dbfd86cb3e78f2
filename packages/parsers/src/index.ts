// Registry
export {
  ParserRegistry,
  createDefaultRegistry,
  defaultRegistry,
  parse,
  parseStatement,
  detectSource,
  listSources,
} from './registry.js';

export type {
  StatementInput,
  StatementSource,
  NormalizationRules,
  ExtractedStatement,
  ParsedStatement,
} from './types.js';

// Sources
export {
  BUILTIN_SOURCES,
  bbCreditCardSource,
  cardInvoiceSource,
  checkingCsvSource,
  cardCsvSource,
  bankExtractCsvSource,
  isBbCreditCard,
} from './sources/index.js';
export { createDelimitedSource, type DelimitedSourceConfig, type DelimitedColumns } from './delimited.js';

// Normalizer
export {
  normalize,
  normalizeRecord,
  normalizeAll,
  cleanDescription,
  type NormalizeOptions,
} from './normalizer.js';

// Reconciliation
export {
  checkStatementTotals,
  type ReconciliationCheck,
  type ReconciliationStatus,
} from './reconciliation.js';

// Statement files
export {
  selectStatementFiles,
  listStatementFiles,
  readStatementFile,
  STATEMENT_EXTENSIONS,
  type StatementFile,
  type SkippedFile,
  type StatementFileSelection,
} from './statement-files.js';

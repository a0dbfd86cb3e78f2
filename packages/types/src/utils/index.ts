export { LEDGER_VERSION, DEFAULT_COUNTRY, SHEET_COLUMNS, MATCHING_DEFAULTS, RECONCILIATION_TOLERANCE } from './constants.js';
export {
  parseStatementDate,
  parseLooseDate,
  isValidCalendarDate,
  isValidISODate,
  toISODate,
  formatBrazilianDate,
  compareDates,
} from './date.js';
export { parseAmount, roundToTwoDecimals, sumAmounts, formatBRL, formatDecimal } from './money.js';
export { computeFingerprint, isValidFingerprint, type FingerprintInput } from './fingerprint.js';

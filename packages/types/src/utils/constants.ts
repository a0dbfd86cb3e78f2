export const LEDGER_VERSION = '0.4.0';

export const DEFAULT_COUNTRY = 'BR';

export const SHEET_COLUMNS = ['Date', 'Description', 'Amount', 'Account', 'Category', 'Owner'] as const;

export const MATCHING_DEFAULTS = {
  THRESHOLD: 0.6,
  MIN_MATCH_LENGTH: 4,
} as const;

export const RECONCILIATION_TOLERANCE = 0.01;

import { ConfigError, MATCHING_DEFAULTS } from '@ledger/types';

export const AMOUNT_FORMATS = ['decimal', 'brl'] as const;
export type AmountFormat = typeof AMOUNT_FORMATS[number];

// Helper to parse boolean env vars
export const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

export function parseThreshold(value: string | undefined): number {
  if (value === undefined) return MATCHING_DEFAULTS.THRESHOLD;
  const threshold = Number(value);
  if (!Number.isFinite(threshold) || threshold <= 0 || threshold > 1) {
    throw new ConfigError(`--threshold must be a number in (0, 1], got "${value}"`);
  }
  return threshold;
}

export function parseMinMatch(value: string | undefined): number {
  if (value === undefined) return MATCHING_DEFAULTS.MIN_MATCH_LENGTH;
  const minMatch = Number(value);
  if (!Number.isInteger(minMatch) || minMatch < 1) {
    throw new ConfigError(`--min-match must be a positive integer, got "${value}"`);
  }
  return minMatch;
}

export function parseAmountFormat(value: string | undefined): AmountFormat {
  if (value === undefined) return 'decimal';
  const match = AMOUNT_FORMATS.find((format) => format === value);
  if (match === undefined) {
    throw new ConfigError(`--amount-format must be one of ${AMOUNT_FORMATS.join(', ')}, got "${value}"`);
  }
  return match;
}

// Generate .env template content
export function generateEnvTemplate(): string {
  return `# Statement ledger environment variables
# Generated by: ledger init

# =============================================================================
# GOOGLE SHEETS
# =============================================================================

# Spreadsheet id (the long id in the sheet URL)
SPREADSHEET_ID=

# Path to the service-account key file. Share the spreadsheet with the
# service account's email address as Editor.
GOOGLE_SHEETS_CREDENTIALS=./credentials.json

# Worksheet holding the transaction history
# LEDGER_WORKSHEET=Transactions

# Worksheet written by: ledger references --write
# LEDGER_REFERENCE_WORKSHEET=References

# =============================================================================
# IMPORT OPTIONS
# =============================================================================

# Directory scanned for statements (equivalent to --input-dir)
LEDGER_INPUT_DIR=./statements

# Parse every file as this source instead of detecting it (equivalent to --source)
# LEDGER_SOURCE=

# Who made the expenses in these statements (equivalent to --owner)
# LEDGER_OWNER=

# Fuzzy match threshold, 0..1 (equivalent to --threshold)
# LEDGER_THRESHOLD=${MATCHING_DEFAULTS.THRESHOLD}

# Minimum common substring length for a fuzzy match (equivalent to --min-match)
# LEDGER_MIN_MATCH=${MATCHING_DEFAULTS.MIN_MATCH_LENGTH}

# Use the category printed by the statement when history has no match (true/false)
# LEDGER_SOURCE_CATEGORIES=false

# Fail statements whose captured total differs from the printed total (true/false)
# LEDGER_STRICT=false

# Parse and categorize without writing to the sheet (true/false)
# LEDGER_DRY_RUN=false

# Also write the categorized transactions to this CSV file (equivalent to --out)
# LEDGER_OUTPUT_FILE=

# CSV amount format: decimal or brl (equivalent to --amount-format)
# LEDGER_AMOUNT_FORMAT=decimal

# Enable verbose output (true/false)
# LEDGER_VERBOSE=false
`;
}

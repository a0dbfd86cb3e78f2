import { RECONCILIATION_TOLERANCE, roundToTwoDecimals } from '@ledger/types';
import type { ParsedStatement } from './types.js';

export type ReconciliationStatus = 'matched' | 'mismatch' | 'no-total';

export interface ReconciliationCheck {
  sourceId: string;
  fileName: string;
  status: ReconciliationStatus;
  capturedTotal: number;
  expectedTotal: number | null;
  difference: number | null;
}

/**
 * Compare the sum of captured line items with the total printed on the statement.
 * Sources without a printed total report `no-total`.
 */
export function checkStatementTotals(
  parsed: ParsedStatement,
  tolerance: number = RECONCILIATION_TOLERANCE
): ReconciliationCheck {
  const base = {
    sourceId: parsed.sourceId,
    fileName: parsed.fileName,
    capturedTotal: parsed.capturedTotal,
    expectedTotal: parsed.expectedTotal,
  };

  if (parsed.expectedTotal === null) {
    return { ...base, status: 'no-total', difference: null };
  }

  const difference = roundToTwoDecimals(parsed.capturedTotal - parsed.expectedTotal);
  return {
    ...base,
    status: Math.abs(difference) < tolerance ? 'matched' : 'mismatch',
    difference,
  };
}

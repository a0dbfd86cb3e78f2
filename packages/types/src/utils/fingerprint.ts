/**
 * Deterministic transaction fingerprints.
 *
 * Two transactions with the same date, amount, account and description (ignoring
 * case and spacing) share a fingerprint. The importer uses it to skip rows already
 * present in the sheet when a statement is imported twice.
 */

import { createHash } from 'crypto';

export interface FingerprintInput {
  date: string;
  amount: number;
  account: string;
  description: string;
}

function normalizeDescription(description: string): string {
  return description.trim().toUpperCase().replace(/\s+/g, ' ');
}

/**
 * Format: `<account>-<date>-<hash12>`, e.g. `card-csv-2024-03-02-1f3a9c04b2de`.
 */
export function computeFingerprint(input: FingerprintInput): string {
  const payload = [
    input.account,
    input.date,
    input.amount.toFixed(2),
    normalizeDescription(input.description),
  ].join('|');

  const hash = createHash('sha256').update(payload).digest('hex').slice(0, 12);
  return `${input.account}-${input.date}-${hash}`;
}

export function isValidFingerprint(fingerprint: string): boolean {
  return /^[a-z0-9-]+-\d{4}-\d{2}-\d{2}-[a-f0-9]{12}$/.test(fingerprint);
}

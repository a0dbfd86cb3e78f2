/**
 * Shared line handling for card invoices exported as plain text.
 */

import { parseAmount } from '@ledger/types';

export const REFUNDS_CATEGORY = 'Refunds';
export const REFUNDS_SECTION_MARKER = 'PAGAMENTOS/CRÉDITOS';

const SECTION_HEADER_RE = /^[A-Za-zÀ-ÿ][A-Za-zÀ-ÿ\s]*[A-Za-zÀ-ÿ]$/;

export interface TextLine {
  text: string;
  lineNumber: number;
}

/**
 * Trimmed, non-empty lines with their 1-based position; page markers dropped.
 */
export function toLines(content: string): TextLine[] {
  const lines: TextLine[] = [];
  content.split(/\r?\n/).forEach((raw, i) => {
    const text = raw.trim();
    if (text === '' || text.startsWith('Página')) return;
    lines.push({ text, lineNumber: i + 1 });
  });
  return lines;
}

/**
 * A letters-only line names the spending section that follows (Restaurantes, Serviços...).
 */
export function isSectionHeader(line: string): boolean {
  return SECTION_HEADER_RE.test(line) && !line.includes('R$') && !line.includes('/') && !/\d/.test(line);
}

export function containsAny(upperLine: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => upperLine.includes(phrase));
}

export function extractTotal(content: string, totalRe: RegExp): number | null {
  for (const line of content.split(/\r?\n/)) {
    const match = totalRe.exec(line);
    const value = match?.[1];
    if (value !== undefined) {
      return parseAmount(value, ',');
    }
  }
  return null;
}

/**
 * Banco do Brasil (SISBB) credit card invoice exported as text. Only the
 * DEMONSTRATIVO section carries line items:
 *
 *   DEMONSTRATIVO
 *   Restaurantes
 *   05.03.2024PADARIA SAO JOAO        BR     12,50     0,00
 *   RESUMO EM REAL
 */

import { MalformedStatementError, type RawRecord } from '@ledger/types';
import type { ExtractedStatement, StatementInput, StatementSource } from '../types.js';
import {
  REFUNDS_CATEGORY,
  REFUNDS_SECTION_MARKER,
  containsAny,
  extractTotal,
  isSectionHeader,
  toLines,
} from '../text/invoice-lines.js';

const SOURCE_ID = 'bb-credit-card';

const SISBB_MARKER = 'SISBB - Sistema de Informações Banco do Brasil';
const INVOICE_MARKER = 'Fatura do Cartão de Crédito';
const SECTION_START = 'DEMONSTRATIVO';
const SECTION_END = 'RESUMO EM REAL';

const TRANSACTION_RE =
  /^(?<date>\d{2}\.\d{2}\.\d{4})(?<description>.+?)\s*(?<country>[A-Z]{2})\s+(?<value>-?[\d.,]+)\s+[\d.,]+$/;
const TOTAL_RE = /^\s*Total\s+[\d\s]+\s+([\d.,]+)\s+[\d.,]+$/;

const IGNORED_PHRASES = ['SALDO FATURA ANTERIOR', 'SUBTOTAL', '----'] as const;

export function isBbCreditCard(content: string): boolean {
  return content.includes(SISBB_MARKER) && content.includes(INVOICE_MARKER);
}

function extract(input: StatementInput): ExtractedStatement {
  const lines = toLines(input.content);
  const start = lines.findIndex((line) => line.text.includes(SECTION_START));
  if (start < 0) {
    throw new MalformedStatementError(SOURCE_ID, `Missing ${SECTION_START} section`);
  }

  const records: RawRecord[] = [];
  const warnings: string[] = [];
  let currentCategory: string | undefined;

  for (const { text, lineNumber } of lines.slice(start + 1)) {
    if (text.includes(SECTION_END)) break;

    const upper = text.toUpperCase();
    if (containsAny(upper, IGNORED_PHRASES) || /^TOTAL\b/.test(upper) || /^DATA\s+TRANSAÇÕES/.test(upper)) {
      continue;
    }

    if (upper.includes(REFUNDS_SECTION_MARKER)) {
      currentCategory = REFUNDS_CATEGORY;
      continue;
    }

    if (isSectionHeader(text)) {
      currentCategory = text;
      continue;
    }

    const groups = TRANSACTION_RE.exec(text)?.groups;
    if (groups === undefined) continue;

    records.push({
      sourceId: SOURCE_ID,
      lineNumber,
      date: groups['date'] ?? '',
      description: (groups['description'] ?? '').trim(),
      amount: groups['value'] ?? '',
      ...(currentCategory !== undefined ? { category: currentCategory } : {}),
      country: groups['country'] ?? '',
      originalText: text,
    });
  }

  const expectedTotal = extractTotal(input.content, TOTAL_RE);
  if (expectedTotal === null) {
    warnings.push('Could not find the invoice total line');
  }
  if (records.length === 0) {
    warnings.push('No transactions found');
  }

  return { records, expectedTotal, warnings };
}

export const bbCreditCardSource: StatementSource = {
  id: SOURCE_ID,
  label: 'Banco do Brasil credit card invoice (SISBB text)',
  format: 'text',
  rules: {
    dateFormat: 'DD.MM.YYYY',
    decimalSeparator: ',',
    signConvention: 'expense-positive',
  },
  detect: (input) => isBbCreditCard(input.content),
  extract,
};

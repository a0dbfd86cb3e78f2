/**
 * Card invoice ("fatura") exported as text.
 *
 *   Vencimento: 10/04/2024
 *   Restaurantes
 *   05/03 PADARIA SAO JOAO BR R$ 12,50
 *   PAGAMENTOS/CRÉDITOS
 *   18/03 ESTORNO LOJA X R$ -40,00
 *   Total da Fatura R$ 1.234,56
 *
 * Transactions print day/month only; the year comes from the due date.
 */

import { DEFAULT_COUNTRY, MalformedStatementError, type RawRecord } from '@ledger/types';
import type { ExtractedStatement, StatementInput, StatementSource } from '../types.js';
import {
  REFUNDS_CATEGORY,
  REFUNDS_SECTION_MARKER,
  containsAny,
  extractTotal,
  isSectionHeader,
  toLines,
} from '../text/invoice-lines.js';
import { isBbCreditCard } from './bb-credit-card.js';

const SOURCE_ID = 'card-invoice';

const TRANSACTION_RE =
  /^(?<date>\d{2}\/\d{2})\s+(?<description>.+?)(?:\s+(?<country>[A-Z]{2})\s+)?\s*R\$\s*(?<value>-?[\d.,]+)$/;
const TOTAL_RE = /Total da Fatura\s+R\$\s*([\d.,]+)/;
const FULL_DATE_RE = /\b(\d{2})\/(\d{2})\/(\d{4})\b/;

const IGNORED_PHRASES = [
  'DATA DESCRIÇÃO PAÍS VALOR',
  'SALDO FATURA ANTERIOR',
  'SUBTOTAL',
  'TOTAL DA FATURA',
  // previous invoice paid by automatic debit
  'PGTO DEBITO CONTA',
] as const;

function detect(input: StatementInput): boolean {
  if (isBbCreditCard(input.content)) return false;
  if (TOTAL_RE.test(input.content)) return true;
  return toLines(input.content).some((line) => TRANSACTION_RE.test(line.text));
}

function extract(input: StatementInput): ExtractedStatement {
  const dueDate = FULL_DATE_RE.exec(input.content);
  if (dueDate === null) {
    throw new MalformedStatementError(SOURCE_ID, 'No DD/MM/YYYY date found to infer the statement year');
  }
  const closingMonth = parseInt(dueDate[2] ?? '', 10);
  const yearHint = parseInt(dueDate[3] ?? '', 10);

  const records: RawRecord[] = [];
  const warnings: string[] = [];
  let currentCategory: string | undefined;

  for (const { text, lineNumber } of toLines(input.content)) {
    const upper = text.toUpperCase();

    if (containsAny(upper, IGNORED_PHRASES)) continue;

    if (upper.includes(REFUNDS_SECTION_MARKER)) {
      currentCategory = REFUNDS_CATEGORY;
      continue;
    }

    if (isSectionHeader(text)) {
      currentCategory = text;
      continue;
    }

    const match = TRANSACTION_RE.exec(text);
    const groups = match?.groups;
    if (groups === undefined) continue;

    records.push({
      sourceId: SOURCE_ID,
      lineNumber,
      date: groups['date'] ?? '',
      description: (groups['description'] ?? '').trim(),
      amount: groups['value'] ?? '',
      ...(currentCategory !== undefined ? { category: currentCategory } : {}),
      country: groups['country'] ?? DEFAULT_COUNTRY,
      yearHint,
      closingMonth,
      originalText: text,
    });
  }

  const expectedTotal = extractTotal(input.content, TOTAL_RE);
  if (expectedTotal === null) {
    warnings.push("Could not find 'Total da Fatura' in the statement");
  }
  if (records.length === 0) {
    warnings.push('No transactions found');
  }

  return { records, expectedTotal, warnings };
}

export const cardInvoiceSource: StatementSource = {
  id: SOURCE_ID,
  label: 'Card invoice text export (Total da Fatura)',
  format: 'text',
  rules: {
    dateFormat: 'DD/MM',
    decimalSeparator: ',',
    signConvention: 'expense-positive',
  },
  detect,
  extract,
};

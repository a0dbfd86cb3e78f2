import type { StatementSource } from '../types.js';
import { bbCreditCardSource } from './bb-credit-card.js';
import { cardInvoiceSource } from './card-invoice.js';
import { checkingCsvSource } from './checking-csv.js';
import { cardCsvSource } from './card-csv.js';
import { bankExtractCsvSource } from './bank-extract-csv.js';

export { bbCreditCardSource, isBbCreditCard } from './bb-credit-card.js';
export { cardInvoiceSource } from './card-invoice.js';
export { checkingCsvSource } from './checking-csv.js';
export { cardCsvSource } from './card-csv.js';
export { bankExtractCsvSource } from './bank-extract-csv.js';

// Detection order matters: SISBB invoices also look like generic invoices.
export const BUILTIN_SOURCES: readonly StatementSource[] = [
  bbCreditCardSource,
  cardInvoiceSource,
  checkingCsvSource,
  cardCsvSource,
  bankExtractCsvSource,
];

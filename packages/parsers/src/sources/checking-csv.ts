import { createDelimitedSource } from '../delimited.js';

/**
 * Checking account export. Amounts are unsigned; the Type column says which way
 * the money went.
 *
 *   Date,Desc,Amount,Type
 *   01/02/2024,Coffee Shop,4.50,Debit
 */
export const checkingCsvSource = createDelimitedSource({
  id: 'checking-csv',
  label: 'Checking account CSV (Date,Desc,Amount,Type)',
  delimiter: ',',
  header: ['Date', 'Desc', 'Amount', 'Type'],
  columns: { date: 'Date', description: 'Desc', amount: 'Amount', type: 'Type' },
  rules: {
    dateFormat: 'DD/MM/YYYY',
    decimalSeparator: '.',
    signConvention: 'type-column',
    debitTypes: ['debit', 'debito', 'dr', 'd', 'withdrawal', 'saida'],
    creditTypes: ['credit', 'credito', 'cr', 'c', 'deposit', 'entrada'],
  },
});

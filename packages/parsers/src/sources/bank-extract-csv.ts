import { createDelimitedSource } from '../delimited.js';

/**
 * Bank account extract with Brazilian formatting: semicolon-delimited, decimal
 * comma, signed values (debits already negative).
 */
export const bankExtractCsvSource = createDelimitedSource({
  id: 'bank-extract-csv',
  label: 'Bank extract CSV (Data;Histórico;Valor)',
  delimiter: ';',
  header: ['Data', 'Histórico', 'Valor'],
  columns: { date: 'Data', description: 'Histórico', amount: 'Valor' },
  rules: {
    dateFormat: 'DD/MM/YYYY',
    decimalSeparator: ',',
    signConvention: 'signed',
  },
});

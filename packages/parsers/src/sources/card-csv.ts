import { createDelimitedSource } from '../delimited.js';

// Card export: purchases are positive, refunds and bill payments negative.
export const cardCsvSource = createDelimitedSource({
  id: 'card-csv',
  label: 'Credit card CSV (date,title,amount)',
  delimiter: ',',
  header: ['date', 'title', 'amount'],
  columns: { date: 'date', description: 'title', amount: 'amount' },
  rules: {
    dateFormat: 'YYYY-MM-DD',
    decimalSeparator: '.',
    signConvention: 'expense-positive',
  },
});

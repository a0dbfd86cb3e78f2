import type { Transaction } from '@ledger/types';

export function tx(description: string, category: string | null, date = '2024-01-15', overrides: Partial<Transaction> = {}): Transaction {
  return {
    date,
    description,
    amount: -10,
    account: 'card-csv',
    category,
    ...overrides,
  };
}

/**
 * TransactionStore interface. Lives in @ledger/types so the importer and the
 * sheet adapters can share it without depending on each other.
 */

import type { Transaction } from '../schemas/index.js';

export interface AppendResult {
  appended: number;
  range: string | null;
}

export interface TransactionStore {
  readHistory(): Promise<Transaction[]>;
  appendTransactions(transactions: Transaction[]): Promise<AppendResult>;
}

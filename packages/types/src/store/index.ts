export type { AppendResult, TransactionStore } from './store-interface.js';

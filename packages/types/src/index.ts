// Zod schemas
export * from './schemas/index.js';

// Error taxonomy
export * from './errors.js';

// Store interface (TransactionStore)
export * from './store/index.js';

// Pure utils (date, money, fingerprint, constants)
export * from './utils/index.js';

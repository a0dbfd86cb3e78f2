import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ledger/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@ledger/parsers': path.resolve(root, 'packages/parsers/src/index.ts'),
      '@ledger/categorizer': path.resolve(root, 'packages/categorizer/src/index.ts'),
      '@ledger/sheets': path.resolve(root, 'packages/sheets/src/index.ts'),
      '@ledger/output': path.resolve(root, 'packages/output/src/index.ts'),
      '@ledger/importer': path.resolve(root, 'packages/importer/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});

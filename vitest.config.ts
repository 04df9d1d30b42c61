import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // argon2id holds up to 64MB per derivation; forks keep each worker's memory separate
    pool: 'forks',
    include: ['packages/*/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // argon2id derivations at real cost parameters
    testTimeout: 30_000,
  },
});

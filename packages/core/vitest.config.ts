import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@fieldwork/shared': path.resolve(__dirname, '../shared/src'),
      '@fieldwork/db': path.resolve(__dirname, '../db/src'),
    },
  },
  test: {
    name: 'core',
    globals: true,
    environment: 'node',
    testTimeout: 10_000,
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/**/__tests__/**'],
    },
  },
});

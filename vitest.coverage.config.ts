import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/*/src/**/__tests__/**/*.test.ts', 'packages/*/src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary'],
      include: ['apps/clinic-core/src/**/*.ts', 'packages/**/src/**/*.ts'],
      exclude: [
        '**/__tests__/**',
        'apps/clinic-core/src/index.ts',
        'apps/clinic-core/src/data/postgres-database.ts',
        '**/*.d.ts',
        '**/types.ts',
      ],
      thresholds: {
        lines: 85,
        statements: 85,
      },
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/*/src/**/__tests__/integration/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
});

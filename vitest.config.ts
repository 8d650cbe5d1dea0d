import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts', 'scripts/__tests__/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
});

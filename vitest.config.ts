import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'client/src/**/*.test.{ts,tsx}'],
    setupFiles: ['src/test.setup.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});

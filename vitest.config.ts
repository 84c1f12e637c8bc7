import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@tabula/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@tabula/postgres': fileURLToPath(new URL('./packages/postgres/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
    environment: 'node',
  },
});

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@kb-graph/types': fileURLToPath(new URL('../types/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'storage',
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
  },
});

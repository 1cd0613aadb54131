import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (name: string): string => fileURLToPath(new URL(`../${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    // workspace packages run from their sources, not dist/
    alias: {
      '@kb-graph/types': source('types'),
      '@kb-graph/core': source('core'),
      '@kb-graph/storage': source('storage'),
    },
  },
  test: {
    name: 'cli',
    testTimeout: 30000,
    // commands change process.exitCode and the working directory
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
  },
});

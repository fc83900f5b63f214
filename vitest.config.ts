import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@catalogsync/core': pkg('core'),
      '@catalogsync/sync-core': pkg('sync-core'),
      '@catalogsync/connector-port': pkg('connector-port'),
      '@catalogsync/connector-bigquery': pkg('connector-bigquery'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});

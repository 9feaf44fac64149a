import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@pgnreplay/pgn': packageEntry('pgn'),
      '@pgnreplay/test-utils': packageEntry('test-utils'),
    },
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});

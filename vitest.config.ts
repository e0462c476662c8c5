import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@bookbinder/utils': pkg('utils'),
      '@bookbinder/core': pkg('core'),
      '@bookbinder/media': pkg('media'),
      '@bookbinder/processing': pkg('processing'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
    clearMocks: true,
    restoreMocks: true,
    testTimeout: 20000,
  },
});

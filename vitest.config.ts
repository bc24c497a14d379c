import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const core = (p: string) => fileURLToPath(new URL(`./packages/core/src/${p}`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'threads',
    include: ['**/*.test.ts', '**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: [
      // the workspace package by name, without a build step
      { find: /^@sensorcast\/core$/, replacement: core('index.ts') },
      { find: /^@sensorcast\/core\/testing$/, replacement: core('testing/fakes.ts') },
    ],
  },
});

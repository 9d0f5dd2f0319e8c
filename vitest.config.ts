import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  define: {
    'import.meta.vitest': 'undefined',
  },
  test: {
    root,
    globals: true,
    environment: 'node',
    setupFiles: ['./packages/core/src/test/setup-request-matcher.ts'],
    chaiConfig: {
      truncateThreshold: 0, // 0 = disable truncation completely
    },

    diff: {
      truncateThreshold: 0,

      expand: true,
    },
    include: [`${root}packages/*/src/**/*.test.ts`, `${root}tests/src/**/*.test.ts`],
    includeSource: [`${root}packages/*/src/**/*.ts`],

    coverage: {
      enabled: true,
      provider: 'istanbul',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/test/**', 'packages/*/src/**/*.test.ts'],
    },
  },
});

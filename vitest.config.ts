import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    env: {
      VERBOSE: 'false',
    },
  },
});

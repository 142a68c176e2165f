import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    // Each run builds its own Account; forks keep suites isolated anyway
    pool: 'forks',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
});

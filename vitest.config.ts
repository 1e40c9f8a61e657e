import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/unit/**/*.test.ts'],
    // tree-sitter is a native addon; keep each test file in its own process
    pool: 'forks',
    testTimeout: 20000,
    server: {
      deps: {
        // web-tree-sitter reassigns module.exports during init(); load it through Node directly
        external: [/web-tree-sitter/],
      },
    },
  },
});

import { defineConfig } from 'vitest/config';

// Tests default to node; DOM-bound suites opt into happy-dom per file
export default defineConfig({
  test: {
    globals: true,
    include: ['src/**/*.test.ts'],
    setupFiles: ['./src/test/setup.ts'],
    environment: 'node',
    testTimeout: 10000,
    hookTimeout: 10000,
    isolate: true,
    // @esm-bundle/chai (via @open-wc/testing) ships only its `module` entry, which SSR
    // resolution skips; inline @open-wc/testing and point the import at that entry
    alias: {
      '@esm-bundle/chai': '@esm-bundle/chai/esm/chai.js',
    },
    server: {
      deps: {
        inline: ['@open-wc/testing'],
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'html'],
      exclude: ['node_modules/', 'src/test/', 'dist/', '*.config.ts', '**/*.test.ts'],
      include: ['src/**/*.ts'],
      reportsDirectory: './coverage',
    },
  },
});

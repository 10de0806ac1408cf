import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment configuration
    environment: 'node',

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        'vitest.config.ts',
        'vitest.performance.config.ts',
        'src/index.ts' // Server entry point, routes are tested via inject
      ]
    },

    // Test file patterns; performance tests run through vitest.performance.config.ts
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**', 'src/**/*.performance.test.ts'],

    // The randomized oracle tests walk the whole tree after every step
    testTimeout: 30000,
    hookTimeout: 10000,

    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: false,
      }
    },

    // Global test setup
    globals: true,

    // Watch options
    watch: false
  }
});

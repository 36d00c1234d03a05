import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // One project per workspace package
    projects: ['packages/@tapeline/*/vitest.config.ts'],

    // Global test settings
    globals: true,
    environment: 'node',
    testTimeout: 30000,

    // Test file patterns
    include: ['**/*.{test,spec}.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/build/**',
    ],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        lines: 80,
        functions: 80,
        statements: 80,
        branches: 70,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.config.ts',
        '**/*.setup.ts',
        '**/test/**',
        '**/__tests__/**',
        '**/__benchmarks__/**',
      ],
    },
  },
});

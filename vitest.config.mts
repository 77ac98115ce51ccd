import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const workspace = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@driftgate/core': workspace('./packages/core/src/index.ts'),
      '@driftgate/engine': workspace('./packages/engine/src/index.ts'),
      '@driftgate/connectors': workspace('./packages/connectors/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',

    // Include patterns
    include: [
      'packages/**/src/**/__tests__/**/*.test.ts',
      'apps/**/src/**/__tests__/**/*.test.ts',
    ],

    // Exclude patterns
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    env: {
      NODE_ENV: 'test',
    },

    // Test timeout
    testTimeout: 30000,
    hookTimeout: 30000,

    // ===================================================================
    // COVERAGE CONFIGURATION (vitest run --coverage)
    // ===================================================================

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: [
        'packages/*/src/**/*.ts',
        'apps/*/src/**/*.ts',
      ],
      exclude: [
        '**/__tests__/**',
        '**/*.test.ts',
        '**/dist/**',
      ],
    },

    reporters: ['default'],

    watch: false,

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    mockReset: true,        // Reset mocks between tests
    restoreMocks: true,     // Restore original implementations
    clearMocks: true,       // Clear mock history
  },
});

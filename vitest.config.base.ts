import { defineConfig } from 'vitest/config';

/**
 * Base Vitest configuration shared across all test types.
 *
 * Test Categories:
 * - Unit: Fast, isolated, co-located with sources (vitest.config.unit.ts)
 * - Integration: Registry, interpreter and dispatcher against a fake UI (vitest.config.integration.ts)
 */
export const baseConfig = {
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8' as const,
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/__tests__/**',
        '**/types.ts',
        '**/index.ts',
      ],
    },
  },
};

export default defineConfig(baseConfig);

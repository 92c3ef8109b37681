import { defineConfig, mergeConfig } from 'vitest/config';
import { baseConfig } from './vitest.config.base.js';

/**
 * Integration Tests Configuration
 *
 * Interpreter, factory, registry and dispatcher working together against
 * the in-process fake UI.
 *
 * Run with: npm run test:integration
 */
export default mergeConfig(
  baseConfig,
  defineConfig({
    test: {
      include: ['src/__tests__/integration/**/*.test.ts'],
      exclude: ['node_modules/', 'dist/'],
      testTimeout: 15000,
    },
  }),
);

import { defineConfig, mergeConfig } from 'vitest/config';
import { baseConfig } from './vitest.config.base.js';

/**
 * Default Vitest Configuration
 *
 * Runs ALL tests (unit + integration).
 * For faster feedback, use specific configs:
 * - npm run test:unit        - Co-located unit tests only
 * - npm run test:integration - End-to-end dispatch against the fake UI
 */
export default mergeConfig(
  baseConfig,
  defineConfig({
    test: {
      include: ['src/**/*.test.ts'],
      exclude: ['node_modules/', 'dist/'],
      testTimeout: 10000,
    },
  }),
);

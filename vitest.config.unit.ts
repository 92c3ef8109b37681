import { defineConfig, mergeConfig } from 'vitest/config';
import { baseConfig } from './vitest.config.base.js';

/**
 * Unit Tests Configuration
 *
 * Fast, isolated tests next to the module they cover.
 *
 * Run with: npm run test:unit
 */
export default mergeConfig(
  baseConfig,
  defineConfig({
    test: {
      include: ['src/**/*.test.ts'],
      exclude: ['node_modules/', 'dist/', 'src/__tests__/**'],
      testTimeout: 5000, // Unit tests should be fast
    },
  }),
);

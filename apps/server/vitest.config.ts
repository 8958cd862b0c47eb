/**
 * Main Vitest Configuration
 *
 * Runs every test under src/ with `npm test`.
 */

import { defineConfig, mergeConfig } from 'vitest/config';
import { sharedConfig } from './vitest.shared.js';

export default mergeConfig(
  sharedConfig,
  defineConfig({
    test: {
      include: ['src/**/*.test.ts'],
      exclude: ['**/node_modules/**', '**/dist/**'],
      coverage: {
        provider: 'v8',
        reporter: ['text', 'html'],
        reportsDirectory: './coverage',
        include: ['src/services/**/*.ts', 'src/routes/**/*.ts', 'src/jobs/**/*.ts', 'src/utils/**/*.ts'],
        exclude: ['**/*.test.ts', '**/test/**', '**/types.ts'],
      },
    },
  })
);

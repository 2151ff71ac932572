import { defineConfig } from 'vitest/config';

/**
 * Test layout:
 * - tests/unit: parser, flags, evaluator, loaders, validator
 * - tests/integration: file-system backed runs (rule files, batch directories)
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    hookTimeout: 10000,
    setupFiles: ['./tests/setup.ts'],
    include: [
      'tests/unit/**/*.test.ts',
      'tests/integration/**/*.test.ts'
    ]
  }
});

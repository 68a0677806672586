import { defineConfig } from 'vitest/config';

/**
 * Root vitest configuration for the whole monorepo.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/__tests__/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**'],
    setupFiles: ['./vitest.setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules',
        'dist',
        '**/__tests__/**',
        '**/*.d.ts',
        '**/*.config.ts',
        '**/node_modules/**',
      ],
    },
    testTimeout: 30000,
    reporters: ['default'],
  },
});

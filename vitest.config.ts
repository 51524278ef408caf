import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      // API tests
      './apps/api/vitest.config.ts',

      // Unit tests for shared packages
      {
        test: {
          name: 'shared',
          root: './packages',
          include: ['*/tests/**/*.test.ts'],
          environment: 'node',
          globals: true,
        },
      },
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'html'],
      reportsDirectory: './coverage',
    },
  },
});

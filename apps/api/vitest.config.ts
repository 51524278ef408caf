import path from 'path';
import { fileURLToPath } from 'url';

import { defineConfig } from 'vitest/config';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'api',
    root: __dirname,
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
  },
  resolve: {
    alias: {
      '@weighbridge/shared-types': path.resolve(__dirname, '../../packages/shared-types/src'),
      '@weighbridge/shared-validation': path.resolve(
        __dirname,
        '../../packages/shared-validation/src'
      ),
      '@weighbridge/shared-config': path.resolve(__dirname, '../../packages/shared-config/src'),
    },
  },
});

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      NODE_ENV: 'test'
    },
    include: [
      'packages/*/test/**/*.test.ts',
      'dj/test/**/*.test.ts',
      'console/test/**/*.test.ts'
    ],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks'
  },
  resolve: {
    alias: {
      '@autodj/logger': root('./packages/logger/src/index.ts'),
      '@autodj/config': root('./packages/config/src/index.ts'),
      '@autodj/dj': root('./dj/src/index.ts')
    }
  }
});

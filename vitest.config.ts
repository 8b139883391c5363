import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/test/setup.ts'],
    testTimeout: 15000,
    hookTimeout: 15000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      include: ['src/app/**/*.ts', 'src/services/**/*.ts', 'src/jobs/**/*.ts'],
    },
  },
});

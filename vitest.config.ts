import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.{test,spec}.ts'],
    environment: 'node',
    globals: true,
    pool: 'threads',
    restoreMocks: true
  },
  esbuild: {
    target: 'es2022'
  },
  resolve: {
    conditions: ['node']
  }
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['dist', 'node_modules'],
    environment: 'node',
    globals: true,
    // tests write scratch word lists under the OS temp dir
    testTimeout: 10_000,
  },
});

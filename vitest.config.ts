import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Unit tests only. Database tests live in *.int.test.ts
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/*.int.{test,spec}.ts', '**/node_modules/**'],
    env: {
      NODE_ENV: 'test',
    },
  },
});

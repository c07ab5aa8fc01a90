import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'is-it-spam/src/**/*.test.ts'],
    environment: 'node',
  },
});

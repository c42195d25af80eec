import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    setupFiles: ['packages/backend/test/setup.ts'],
    environment: 'node',
  },
});

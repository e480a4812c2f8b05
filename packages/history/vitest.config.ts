import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'history',
    environment: 'node',
    include: ['__tests__/**/*.test.ts'],
  },
});

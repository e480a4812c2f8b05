import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'history-store',
    environment: 'node',
    include: ['__tests__/**/*.test.ts'],
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'sync-engine',
    environment: 'node',
    include: ['__tests__/**/*.test.ts'],
  },
});

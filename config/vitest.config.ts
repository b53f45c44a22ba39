import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: '@coltype/config',
    include: ['src/__tests__/**/*.test.ts'],
    globals: true,
    environment: 'node',
  },
});

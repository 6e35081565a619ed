import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['device-simulator/tests/**/*.test.ts'],
    testTimeout: 20000,
    restoreMocks: true,
  },
});

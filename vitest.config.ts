import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // Full-size book generation runs in the default suite
    testTimeout: 30000,
    pool: 'threads',
  },
});

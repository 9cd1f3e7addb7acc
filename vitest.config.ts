import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Script runner tests spawn real shell processes
    testTimeout: 10000,
    globals: true,
  },
});

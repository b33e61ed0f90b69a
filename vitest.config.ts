import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    // Timeout paths use short real timers; keep headroom for slow CI hosts
    testTimeout: 10000,
  },
});

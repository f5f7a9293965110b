import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['Shared/tests/**/*.test.ts', 'Runner/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
    // Runner tests spawn real child processes; keep them from competing for CPU
    fileParallelism: false,
  },
});

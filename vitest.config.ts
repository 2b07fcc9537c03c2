import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      PAYROLL_LOG_LEVEL: 'silent',
    },
  },
});

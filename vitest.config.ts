import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/*/src/tests/**/*.test.ts', 'shared/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
      METRICS_ENABLED: 'true',
    },
  },
});

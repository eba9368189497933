import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/src/**/*.test.ts'],
    watch: false,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      SFT_LOG_LEVEL: 'silent',
      SFT_LOG_FORMAT: 'json',
    },
  },
});

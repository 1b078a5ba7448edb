import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test',
      // A zone with daylight saving time, so local-time mistakes show up
      TZ: 'America/New_York',
    },
    testTimeout: 15000,
  },
});

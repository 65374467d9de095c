import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    environment: 'node',
    // הלוגים של המודולים לא מודפסים בזמן הבדיקות
    env: {
      LOG_TO_CONSOLE: 'false',
      LOG_LEVEL: 'error',
    },
    testTimeout: 10_000,
  },
});

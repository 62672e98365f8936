import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // No log file and no console chatter from the library during tests
    env: {
      LOG_PATH: '',
      LOG_CONSOLE: 'false',
    },
  },
});

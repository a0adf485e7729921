import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      DISCORD_BOT_TOKEN: 'test-token',
      DISCORD_CLIENT_ID: 'test-client-id',
      MONGODB_URI: 'mongodb://localhost:27017',
      MONGODB_DB_NAME: 'voice-analytics-test',
      LOG_LEVEL: 'error',
    },
  },
});

import { defineConfig } from 'vitest/config';

// Off UTC, so timestamps read as host-local time show up as shifted
process.env['TZ'] = 'America/New_York';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      TZ: 'America/New_York',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_ANON_KEY: 'test-anon-key',
      SUPABASE_SERVICE_ROLE_KEY: 'test-service-role-key',
      LOG_LEVEL: 'error',
    },
  },
});

import { defineConfig } from 'vitest/config';

// Start instants are composed in local time, so tests pin a zone with DST that is not UTC
process.env.TZ = 'America/New_York';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: { TZ: 'America/New_York' }
  }
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.spec.ts'],
    environment: 'node',
    // keep tests away from a developer's .env
    env: {
      STORE_DRIVER: 'memory',
      STORE_KEY_PREFIX: 'squirrels',
    },
  },
});

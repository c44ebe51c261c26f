import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages_mjs/*/tests/**/*.test.mts'],
    globals: false,
    environment: 'node',
    env: {
      HTTP_CACHE_POLICY_LOG_LEVEL: 'silent',
    },
  },
});

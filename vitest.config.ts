import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'test/**/*.test.ts'],
    env: {
      HOSTSNAP_LOG_LEVEL: 'silent',
    },
  },
});

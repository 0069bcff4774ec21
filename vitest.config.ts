import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    env: {
      DOCNAV_LOG_LEVEL: 'silent',
    },
  },
});

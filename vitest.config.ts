import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      // Console output only; run logs still receive every level
      LOG_LEVEL: 'error',
    },
    coverage: {
      reporter: ['text', 'json', 'html'],
      include: ['src/**'],
    },
  },
});

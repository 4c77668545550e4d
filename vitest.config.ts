import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 30_000,
    clearMocks: true,
    env: {
      // plain notices so assertions see no ANSI codes
      NO_COLOR: '1',
      FORCE_COLOR: '',
      LOG_LEVEL: 'silent',
    },
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});

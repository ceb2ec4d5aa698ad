import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // setupFiles runs before each test file: safe env defaults, metric reset.
    setupFiles: ['tests/setup.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
    testTimeout: 15000,
  },
});

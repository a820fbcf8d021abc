import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./client/src/test/setup.ts'],
    include: [
      'shared/**/*.test.ts',
      'client/src/**/*.test.ts',
      'server/src/**/*.test.ts',
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['shared/**', 'client/src/services/**', 'client/src/db/**', 'server/src/**'],
    },
  },
});

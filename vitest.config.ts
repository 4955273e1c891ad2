import { defineConfig } from 'vitest/config';

// force vitest to use CI mode to avoid watch mode
process.env.CI = 'true';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'packages/registry/src/cli.ts',
        '**/*.test.ts',
        '**/dist/*',
        '**/*.config.ts',
      ],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});

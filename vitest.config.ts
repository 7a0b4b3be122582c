import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 80,
        functions: 80,
        statements: 80,
        branches: 75,
      },
      exclude: [
        'node_modules/**',
        'dist/**',
        'tests/**',
        'scripts/**',
        '**/*.d.ts',
        '**/*.config.*',
        'src/index.ts', // Process entry point - exercised by running the service
        'src/database/client.ts', // pg Pool wiring - needs a live database
      ],
    },
    include: ['tests/**/*.test.ts'],
    testTimeout: 60000,
  },
});

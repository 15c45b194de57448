import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],
    env: {
      NODE_ENV: 'test',
      PORT: '8000',
      LOG_LEVEL: 'silent',
      CORS_ORIGIN: 'http://localhost:3000'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.config.ts',
        '**/*.d.ts',
        'tests/**',
      ],
    },
    // Include TypeScript files
    include: ['tests/**/*.{test,spec}.{ts,tsx}'],
  },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    isolate: true,
    pool: 'forks',
    env: {
      LOG_LEVEL: 'silent',
      // Keep backoff short so retry tests stay fast
      RESERVE_RETRY_BASE_MS: '1',
      RESERVE_RETRY_JITTER_MS: '2',
      FS_RETRY_BASE_MS: '1',
    },
    testTimeout: 30000,
    hookTimeout: 30000,
    setupFiles: ['tests/helpers/test-setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        'tests/',
        '**/*.d.ts',
        '**/*.config.*'
      ]
    }
  }
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      EXIFTOOL_TIMEOUT_MS: '30000',
      METADATA_MIN_DESCRIPTION_LENGTH: '10',
      METADATA_PLACEHOLDER_COMMENTS: 'Screenshot'
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
    include: ['tests/**/*.test.ts'],
  },
});

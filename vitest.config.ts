import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Keep the file logger away from the real ~/.narnia/logs during tests
    env: {
      NARNIA_LOG_LEVEL: 'SILENT',
    },
  },
});

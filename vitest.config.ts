import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    reporters: ['default'],
    env: { LOG_LEVEL: 'silent', LOG_PRETTY: '0' },
    coverage: { reporter: ['text', 'lcov'] }
  }
});

import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts', 'test/**/*.spec.ts'],
    setupFiles: ['../../test/setup.ts'],
    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,
  },
});

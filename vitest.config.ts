import { defineConfig } from 'vitest/config';

/**
 * routeforge test configuration
 *
 * Each workspace package is a Vitest project with its own config; this file
 * only wires them together and fixes the execution policy.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    // No retries - surface issues immediately
    retry: 0,
    // Disable file parallelization in CI for deterministic results
    fileParallelism: !isCI,
    reporters: ['default'],
    projects: ['packages/*'],
  },
});

import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the monorepo.
 *
 * `npm test` at the root runs every workspace's tests with this config. The
 * per-workspace configs in apps/* are used when Vitest runs inside a workspace.
 *
 * Client tests that need a DOM select jsdom with a
 * `// @vitest-environment jsdom` comment at the top of the file.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',    // Colocated tests in apps
            'packages/**/src/**/__tests__/**/*.test.ts' // Colocated tests in packages
        ],
        exclude: ['node_modules', 'dist', 'example', '**/*.d.ts'],
        testTimeout: 30_000,
        hookTimeout: 30_000,
        reporters: 'default',
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'silent'
        }
    }
});

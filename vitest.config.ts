import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration. `npm test` at the root runs every workspace's tests.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/tests/**/*.test.ts',            // Integration tests in tests/ directories
            'apps/**/src/**/__tests__/**/*.test.ts', // Colocated tests in apps
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        testTimeout: 30_000,
        hookTimeout: 30_000,
        reporters: 'default',
        env: {
            NODE_ENV: 'test'
        }
    }
});

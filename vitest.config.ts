import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration. `npm test` runs every colocated test in the
 * backend and the shared packages.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        reporters: 'default',
        env: {
            NODE_ENV: 'test',
            CONTENT_STORE: 'memory'
        }
    }
});

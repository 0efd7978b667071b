import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['packages/formrelay/__tests__/**/*.test.ts'],
        environment: 'node',
        testTimeout: 10_000,
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'error',
        },
    },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['shared/src/**/__tests__/**/*.test.ts', 'server/src/**/__tests__/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            JWT_SECRET: 'test-secret',
            SEED_TOKEN: 'test-seed-token',
        },
    },
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/*.test.ts'],
        exclude: [
            'dist/**',
            'node_modules/**',
        ],
        // The build driver changes process.cwd(), which worker threads do not allow
        pool: 'forks',
        env: {
            TEXWEAVE_LOG_LEVEL: 'error',
        },
    }
});

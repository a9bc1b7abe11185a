import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@': path.resolve(__dirname, 'src')
        }
    },
    test: {
        include: ['tests/**/*.test.ts'],
        environment: 'node',
        env: { NODE_ENV: 'test' },
        testTimeout: 15000
    }
});

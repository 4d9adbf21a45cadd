import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/ts/**/*.spec.ts'],
        exclude: ['node_modules', 'dist'],
        testTimeout: 10000,
    },
});

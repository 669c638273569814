import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        exclude: ['node_modules/**/*'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov'],
            include: ['src/**/*'],
            exclude: ['node_modules/**/*'],
            thresholds: {
                lines: 90,
                statements: 90,
                branches: 85,
                functions: 90,
            },
        },
    },
});

import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        // Tests run against the core sources, not its build output.
        alias: {
            '@portcheck/core': fileURLToPath(new URL('../portcheck-core/src/index.ts', import.meta.url)),
        },
    },
    test: {
        name: 'cli',
        include: ['src/**/*.test.ts'],
    },
});

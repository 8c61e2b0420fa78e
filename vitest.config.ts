import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'persistent-collections',
        environment: 'node',
        include: ['test/**/*.test.ts'],
    },
});

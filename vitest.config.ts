import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['src/**/*.vi.test.ts'],
        exclude: ['node_modules', 'dist'],
        testTimeout: 100000,
        env: {
            NODE_ENV: 'test',
        },
    },
})

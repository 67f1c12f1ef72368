import { defineConfig, configDefaults } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        globals: true,
        clearMocks: true,
        setupFiles: ['./server/src/__tests__/setup.ts'],
        include: [
            'shared/src/**/*.test.ts',
            'server/src/**/*.test.ts',
        ],
        exclude: [...configDefaults.exclude, 'dist/**'],
    },
});

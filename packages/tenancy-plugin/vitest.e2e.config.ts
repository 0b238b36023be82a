import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    plugins: [
        // SWC required to support the decorators used in TenancyPlugin
        swc.vite({
            jsc: {
                transform: {
                    useDefineForClassFields: false,
                    legacyDecorator: true,
                    decoratorMetadata: true,
                },
            },
        }),
    ],
    test: {
        include: ['e2e/**/*.e2e-spec.ts'],
        setupFiles: ['reflect-metadata'],
        testTimeout: 30_000,
        fileParallelism: false,
        hookTimeout: 120_000,
        poolOptions: {
            forks: {
                singleFork: false,
            },
        },
    },
});

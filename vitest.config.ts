import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    },
    resolve: {
        alias: {
            '@dugout/types': workspace('./packages/types/src/index.ts'),
            '@dugout/config': workspace('./packages/config/src/index.ts'),
            '@dugout/sources': workspace('./packages/sources/src/index.ts'),
            '@dugout/catalog': workspace('./packages/catalog/src/index.ts'),
            '@dugout/enrichment': workspace('./packages/enrichment/src/index.ts'),
            '@dugout/presenter': workspace('./packages/presenter/src/index.ts'),
        },
    },
});

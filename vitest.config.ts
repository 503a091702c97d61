import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./packages/engine/src', import.meta.url))
        }
    },
    test: {
        include: ['packages/*/tests/**/*.test.ts'],
        env: {
            PYMON_LOG: 'off'
        }
    }
});

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./packages/launcher-cli/src', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/src/**/*.test.ts'],
        environment: 'node',
        env: {
            OPENCLAW_LAUNCHER_RUNTIME_DIR: join(tmpdir(), 'openclaw-launcher-vitest'),
        },
    },
});

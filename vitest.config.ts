import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        environment: 'node',
        testTimeout: 10000,
        env: {
            LOG_LEVEL: 'error',
            LOG_DIR: path.join(os.tmpdir(), 'botlink-test-logs')
        }
    }
});

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@core': fromRoot('./src/core'),
      '@plugins': fromRoot('./src/plugins'),
      '@routes': fromRoot('./src/routes'),
      '@services': fromRoot('./src/services'),
      '@utils': fromRoot('./src/utils'),
    },
  },
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
  },
});

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./client/src', import.meta.url)),
    },
  },
  test: {
    include: ['{shared,server,client}/src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_TO_FILE: 'false',
      LOG_LEVEL: 'ERROR',
      STORAGE_DRIVER: 'memory',
    },
  },
});

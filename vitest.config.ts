import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@hyp3-client/shared': fileURLToPath(new URL('./shared/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['shared/src/**/*.test.ts', 'sdk/src/**/*.test.ts'],
    environment: 'node',
    env: {
      HYP3_LOG_LEVEL: 'silent',
    },
  },
});

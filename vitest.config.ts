import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
    },
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});

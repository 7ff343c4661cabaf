import path from 'node:path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@agenda/shared': path.resolve(__dirname, 'packages/shared/src/index.ts')
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: [path.resolve(__dirname, 'tests/setup/setupEnv.ts')],
    isolate: true,
    testTimeout: 20_000,
    reporters: 'default'
  }
});

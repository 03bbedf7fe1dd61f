import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      // Tests run against workspace sources; the package's runtime entry is the built dist/.
      '@cdd/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url))
    }
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    // The isolate sandbox switches the working directory, which worker threads do not allow.
    pool: 'forks',
    testTimeout: 20_000
  }
});

import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const rootDir = dirname(fileURLToPath(import.meta.url));

function resolvePath(relativePath: string): string {
  return resolve(rootDir, relativePath);
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['**/*.test.ts'],
    coverage: {
      reporter: ['text', 'lcov'],
      reportsDirectory: 'coverage',
    },
  },
  resolve: {
    alias: {
      '@dharma-relay/core': resolvePath('packages/core/src/index.ts'),
      '@dharma-relay/agent-client': resolvePath('packages/agent-client/src/index.ts'),
      '@dharma-relay/telegram-sdk': resolvePath('packages/telegram-sdk/src/index.ts'),
      '@dharma-relay/knowledge': resolvePath('packages/knowledge/src/index.ts'),
    },
  },
});

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@textflow/common': fromRoot('./shared/common/index.ts'),
      '@textflow/contracts': fromRoot('./packages/layout-engine/contracts/src/index.ts'),
      '@textflow/style-engine': fromRoot('./packages/layout-engine/style-engine/src/index.ts'),
      '@textflow/measuring': fromRoot('./packages/layout-engine/measuring/metrics/src/index.ts'),
      '@textflow/painter-display-list': fromRoot('./packages/layout-engine/painters/display-list/src/index.ts'),
      '@textflow/layout-engine': fromRoot('./packages/layout-engine/layout-engine/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['shared/**/*.test.ts', 'packages/**/*.test.ts'],
  },
});

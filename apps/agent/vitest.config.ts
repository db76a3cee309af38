import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node'
  },
  resolve: {
    alias: {
      '@kaimono/core': resolve(__dirname, '../../packages/core/src/index.ts'),
      '@kaimono/fixtures': resolve(__dirname, '../../packages/fixtures/src/index.ts'),
      '@kaimono/marketplace': resolve(__dirname, '../../packages/marketplace/src/index.ts')
    }
  }
});

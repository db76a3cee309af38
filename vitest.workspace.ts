import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/fixtures/vitest.config.ts',
  'packages/marketplace/vitest.config.ts',
  'apps/agent/vitest.config.ts'
]);

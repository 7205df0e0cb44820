import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/shared',
  'packages/db',
  'packages/core',
  'packages/modules/orders',
  'packages/modules/live',
  'apps/server',
]);

/**
 * Vitest Workspace Configuration
 *
 * Workspace Projects:
 * - core: @vectorscope/core package tests
 * - client: @vectorscope/client package tests
 *
 * Run specific projects:
 *   npx vitest --project=core
 *   npx vitest --project=client
 */
import { fileURLToPath } from 'node:url';
import { defineWorkspace } from 'vitest/config';

const coreEntry = fileURLToPath(
  new URL('./packages/core/src/index.ts', import.meta.url)
);

export default defineWorkspace([
  // Core package (@vectorscope/core)
  {
    test: {
      name: 'core',
      globals: true,
      environment: 'node',
      include: ['packages/core/tests/**/*.test.ts'],
    },
  },
  // Client package (@vectorscope/client)
  {
    resolve: {
      alias: { '@vectorscope/core': coreEntry },
    },
    test: {
      name: 'client',
      globals: true,
      environment: 'node',
      include: ['packages/client/tests/**/*.test.ts'],
    },
  },
]);

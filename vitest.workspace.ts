import { defineWorkspace } from 'vitest/config';

/**
 * Runs the tests of every package with a single command.
 */
export default defineWorkspace([
  {
    extends: './vitest.config.ts',
    test: {
      name: 'perfscope-core',
      root: './packages/core',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },
  {
    extends: './vitest.config.ts',
    test: {
      name: 'perfscope-cli',
      root: './packages/cli',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },
]);

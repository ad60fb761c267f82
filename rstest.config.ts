import { fileURLToPath } from 'node:url';
import { defineConfig } from '@rstest/core';

const workspaceSource = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  include: ['packages/*/tests/**/*.test.ts'],
  testEnvironment: 'node',
  testTimeout: 15000,
  resolve: {
    alias: {
      '@task-transformer/logger': workspaceSource('logger'),
      '@task-transformer/prompts': workspaceSource('prompts'),
      '@task-transformer/bridge': workspaceSource('bridge'),
    },
  },
});

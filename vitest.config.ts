import path from 'path';
import { defineConfig } from 'vitest/config';

const workspacePackages = ['shared', 'safety', 'adapters', 'core', 'cli'];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      workspacePackages.map((name) => [
        `@termwise/${name}`,
        path.resolve(__dirname, 'packages', name, 'src', 'index.ts'),
      ]),
    ),
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});

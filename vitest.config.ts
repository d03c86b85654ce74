import { resolve } from 'node:path';
import swc from 'unplugin-swc';
import { defineConfig, type UserConfig } from 'vitest/config';

// Workspace packages resolve to their compiled output at run time; tests load the sources.
export const globalConfig = {
  test: {
    exclude: ['node_modules', 'dist'],
  },
  resolve: {
    alias: {
      '@sp-indexer/logger': resolve(__dirname, 'packages/logger/src/index.ts'),
      '@sp-indexer/utils': resolve(__dirname, 'packages/utils/src/index.ts'),
    },
  },
  plugins: [swc.vite()],
} satisfies UserConfig;

export default defineConfig({
  ...globalConfig,
  test: {
    ...globalConfig.test,
    projects: ['packages/*/vitest.config.ts', 'services/*/vitest.config.ts'],
  },
});

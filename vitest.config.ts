import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@layerkit/types': pkg('types'),
      '@layerkit/core': pkg('core'),
      '@layerkit/render': pkg('render'),
      '@layerkit/io': pkg('io'),
      '@layerkit/app': pkg('app'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/**/index.ts'],
    },
  },
});

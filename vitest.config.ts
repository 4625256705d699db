import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string, file = 'index'): string =>
  fileURLToPath(new URL(`./packages/${name}/src/${file}.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      // Subpath entries must come before the package entries
      { find: '@zklink/utils/errors', replacement: pkg('utils', 'errors') },
      { find: '@zklink/utils/logger', replacement: pkg('utils', 'logger') },
      { find: '@zklink/sdk/errors', replacement: pkg('sdk', 'errors') },
      { find: '@zklink/utils', replacement: pkg('utils') },
      { find: '@zklink/config', replacement: pkg('config') },
      { find: '@zklink/protocol', replacement: pkg('protocol') },
      { find: '@zklink/transport', replacement: pkg('transport') },
      { find: '@zklink/sdk', replacement: pkg('sdk') },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/vitest.setup.ts'],
    include: ['src/**/*.test.ts', 'test/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts', 'src/**/*.ts'],
      exclude: ['**/*.test.ts', 'src/cli/index.ts'],
    },
  },
});

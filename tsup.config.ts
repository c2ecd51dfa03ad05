import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: ['src/index.ts'],
    format: ['cjs', 'esm'],
    dts: true,
    sourcemap: true,
    splitting: false,
    minify: false,
    platform: 'node',
  },
  {
    // ESM only: the entry guard compares import.meta.url with argv[1]
    entry: ['src/cli.ts'],
    format: ['esm'],
    sourcemap: true,
    splitting: false,
    minify: false,
    platform: 'node',
  },
]);

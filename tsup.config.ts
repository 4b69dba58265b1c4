import { defineConfig } from 'tsup';

// Build configuration for the wordseal CLI
export default defineConfig({
  entry: {
    index: 'src/index.ts',
    api: 'src/lib/index.ts',
  },
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  minify: false,
  banner: {
    js: '#!/usr/bin/env node',
  },
  target: 'node20',
  splitting: false,
});

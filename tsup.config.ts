import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    cli: 'src/cli/index.ts',
  },
  format: ['cjs'],
  target: 'node20',
  // index and cli must share one BaseWorker class for registry instanceof checks
  splitting: true,
  clean: true,
  minify: false,
  sourcemap: true,
  dts: {
    entry: { index: 'src/index.ts' },
  },
  banner: {
    js: '#!/usr/bin/env node'
  }
});

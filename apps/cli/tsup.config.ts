import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { sluice: 'src/index.ts' },
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  bundle: true,
  splitting: false,
  // Workspace packages ship TypeScript sources
  noExternal: [/^@sluice\//],
  banner: {
    js: '#!/usr/bin/env node',
  },
});

import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  banner: {
    js: '#!/usr/bin/env node',
  },
  // Workspace packages export TypeScript sources, so bundle them in
  noExternal: ['@mustard/templates', '@mustard/logger'],
});

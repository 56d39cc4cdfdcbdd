import { defineConfig } from 'tsup';

export default defineConfig([
  // ESM build for library usage
  {
    entry: ['src/index.ts'],
    format: ['esm'],
    target: 'node20',
    outDir: 'dist',
    clean: true,
    sourcemap: true,
    dts: false,
    splitting: false,
    minify: false,
    noExternal: ['@whois-tools/agents'],
  },
  // ESM build for CLI (npm package - can run directly)
  {
    entry: ['src/cli.ts'],
    format: ['esm'],
    target: 'node20',
    outDir: 'dist',
    outExtension: () => ({ js: '.mjs' }),
    clean: false,
    sourcemap: true,
    dts: false,
    splitting: false,
    bundle: true,
    minify: false,
    noExternal: ['@whois-tools/agents'],
    banner: {
      js: '#!/usr/bin/env node',
    },
  },
]);

import { defineConfig } from 'tsup';
import { cpSync, readFileSync } from 'node:fs';

// Read package.json version at build time
const packageJson: { version: string } = JSON.parse(readFileSync('./package.json', 'utf-8'));

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  target: 'node20',
  platform: 'node',
  splitting: false,
  sourcemap: true,
  // Bundle workspace packages; they export TypeScript sources
  noExternal: ['@autoheal/core', '@repo/shared-types', '@repo/shared-config'],
  external: ['@babel/parser'],
  define: {
    __CLI_VERSION__: JSON.stringify(packageJson.version),
  },
  // Built-in rule documents are looked up beside the bundle
  onSuccess: async () => {
    cpSync('../../packages/core/rules', 'dist/rules', { recursive: true });
  },
});

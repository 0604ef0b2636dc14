import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['packages/cli/main.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist/packages/cli',
  dts: false,
  sourcemap: false,
  clean: true,
  skipNodeModulesBundle: true,
});

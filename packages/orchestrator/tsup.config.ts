import { defineConfig } from 'tsup';

const INTERNAL_BUNDLE = [/^@voicescript\//];

export default defineConfig(() => ({
  entry: {
    index: 'src/index.ts',
    cli: 'bin/cli.ts',
  },
  target: 'node20',
  format: ['esm'],
  platform: 'node',
  sourcemap: true,
  clean: true,
  splitting: false,
  treeshake: true,
  minify: false,
  outDir: 'dist',
  dts: false,
  noExternal: INTERNAL_BUNDLE,
  tsconfig: '../../tsconfig.json',
}));

import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  shims: true,
  // nanoid ships ESM only; inline it so the CommonJS build can load it
  noExternal: ['nanoid'],
  splitting: false,
  sourcemap: false,
  clean: true,
});

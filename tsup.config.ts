import { defineConfig } from 'tsup'

export default defineConfig({
  entry: { index: 'src/index.ts' },
  format: ['esm', 'cjs'],
  dts: true,
  // import.meta.url in the CommonJS bundle
  shims: true,
  sourcemap: false,
  splitting: false,
  treeshake: true,
  target: 'es2022',
  external: ['payload'],
  clean: true,
})

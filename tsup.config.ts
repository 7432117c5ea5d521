import { defineConfig } from 'tsup'

export default defineConfig({
  entry: { index: 'src/index.ts' },
  format: ['esm', 'cjs'],
  dts: true,
  sourcemap: true,
  clean: true,
  // Library entry
  external: ['three', 'jszip'],
  treeshake: true,
  splitting: false,
})

import { defineConfig } from 'tsdown'

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm', 'cjs'],
  target: 'node20',

  dts: true,
  sourcemap: true,
  clean: true,

  treeshake: true,
  minify: false,

  platform: 'node'
})

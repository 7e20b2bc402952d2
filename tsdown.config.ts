import { defineConfig } from 'tsdown';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm', 'cjs'],
  dts: true,
  clean: true,
  outDir: 'dist',
  platform: 'node',
  treeshake: true,
  sourcemap: true,
  // runtime dependencies stay external
  external: ['winston', 'zod'],
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    // rendering at zoom 4 rasterizes a few thousand SVG elements
    testTimeout: 20000,
  },
});

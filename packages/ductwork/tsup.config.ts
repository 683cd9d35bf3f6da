import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (context, primitives, decorators, errors, logger)
    index: 'src/index.ts',

    // =========================================================================
    // Integrations
    // =========================================================================
    otel: 'src/otel-entry.ts',

    // =========================================================================
    // Tools
    // =========================================================================
    testing: 'src/testing-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});

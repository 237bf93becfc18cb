import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    // Main entry point (namespace, parsing, grammar, errors)
    index: "src/index.ts",

    // =========================================================================
    // Utility entry points (optional granular imports)
    // =========================================================================
    result: "src/result.ts",
    errors: "src/errors-entry.ts",
  },
  format: ["cjs", "esm"],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});

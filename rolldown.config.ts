import { defineConfig } from "rolldown";

export default defineConfig([
  // ESM bundle (single file)
  {
    input: "src/index.ts",
    external: ["zod/v4"],
    output: {
      file: "dist/signal-graph.esm.js",
      format: "esm",
      sourcemap: true,
    },
  },
  // IIFE bundle minified, zod inlined (for script tags)
  {
    input: "src/index.ts",
    output: {
      file: "dist/signal-graph.iife.min.js",
      format: "iife",
      name: "SignalGraph",
      sourcemap: true,
      minify: true,
    },
  },
]);

import { defineConfig } from "tsup";

// Native and CommonJS packages stay external
const external = ["re2", "pino", "pino-pretty", "got-scraping", "linkedom"];

export default defineConfig([
  // Library
  {
    entry: ["src/index.ts"],
    format: ["esm"],
    dts: true,
    clean: true,
    outDir: "dist",
    splitting: false,
    sourcemap: true,
    target: "node20",
    external,
  },
  // CLI (shebang kept from the source)
  {
    entry: ["src/cli/index.ts"],
    format: ["esm"],
    dts: false,
    outDir: "dist/cli",
    splitting: false,
    sourcemap: true,
    target: "node20",
    external,
  },
]);

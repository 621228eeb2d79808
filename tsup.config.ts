import { defineConfig } from "tsup";

export default defineConfig([
  {
    entry: ["src/index.ts"],
    format: ["esm", "cjs"],
    dts: true,
    splitting: false,
    sourcemap: true,
    clean: true,
    outDir: "dist",
    // "punycode/" is a directory import, which Node's ESM loader refuses
    noExternal: ["punycode"],
    target: "node20",
  },
  {
    entry: ["src/cli/index.ts"],
    format: ["cjs"],
    outDir: "dist/cli",
    banner: { js: "#!/usr/bin/env node" },
    noExternal: ["punycode"],
    target: "node20",
  },
]);

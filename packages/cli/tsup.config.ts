import { readFileSync } from "node:fs";
import { defineConfig } from "tsup";

// Read version from package.json at build time
const pkg: { version: string } = JSON.parse(readFileSync(new URL("./package.json", import.meta.url), "utf-8"));

export default defineConfig({
  entry: ["src/bin.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  target: "node20",
  platform: "node",
  splitting: false,
  sourcemap: false,
  minify: false,
  treeshake: true,
  outExtension() {
    return { js: ".mjs" };
  },
  banner: {
    js: "#!/usr/bin/env node",
  },

  // Bundle the workspace packages into the CLI
  noExternal: ["@ali/core", "@ali/plugin", "@ali/shared"],

  external: [/^node:/],

  esbuildOptions(options) {
    // Inject version from package.json at build time
    options.define = {
      ...options.define,
      __VERSION__: JSON.stringify(pkg.version),
    };
  },
});

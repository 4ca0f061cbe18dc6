import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts", "src/index.ts"],
  format: ["esm"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: true,

  // playwright-core resolves its browser drivers relative to its own files; leave it in node_modules
  external: ["playwright-core"],
});

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "tsup";

const packageDir = path.dirname(fileURLToPath(import.meta.url));
const packagesDir = path.dirname(packageDir);

// Data files the bundled packages locate relative to their own module URL.
const DATA_DIRS: Array<[string, string]> = [
  ["scanner", "rules"],
  ["attacks", "data"],
  ["monitor", "presets"]
];

export default defineConfig({
  entry: [path.join(packageDir, "src/index.ts"), path.join(packageDir, "src/cli.ts")],
  format: ["esm"],
  platform: "node",
  target: "node20",
  splitting: false,
  sourcemap: true,
  clean: false,
  dts: false,
  noExternal: ["@guardrail/core", "@guardrail/scanner", "@guardrail/attacks", "@guardrail/monitor"],
  external: ["yaml", "commander"],
  outDir: path.join(packageDir, "dist"),
  async onSuccess() {
    for (const [pkg, dir] of DATA_DIRS) {
      fs.cpSync(path.join(packagesDir, pkg, dir), path.join(packageDir, dir), { recursive: true });
    }
  }
});

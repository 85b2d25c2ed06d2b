import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

// Centralized test config for root tests/*.test.ts.
export default defineConfig({
  resolve: {
    alias: {
      "@guardrail/core": path.join(rootDir, "packages/core/src/index.ts"),
      "@guardrail/scanner": path.join(rootDir, "packages/scanner/src/index.ts"),
      "@guardrail/attacks": path.join(rootDir, "packages/attacks/src/index.ts"),
      "@guardrail/monitor": path.join(rootDir, "packages/monitor/src/index.ts"),
      "@guardrail/cli": path.join(rootDir, "packages/cli/src/index.ts")
    }
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node"
  }
});

import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@shiplog/core": path.join(rootDir, "packages/core/src/index.ts"),
      "@shiplog/provider-git": path.join(rootDir, "packages/provider-git/src/index.ts"),
      "@shiplog/renderer-internal": path.join(rootDir, "packages/renderer-internal/src/index.ts"),
      "@shiplog/cli": path.join(rootDir, "packages/cli/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/**/test/**/*.test.ts"]
  }
});

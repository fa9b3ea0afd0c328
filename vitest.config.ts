import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@archive-manifest/utils": fileURLToPath(
        new URL("./packages/utils/src/index.ts", import.meta.url),
      ),
    },
  },
});

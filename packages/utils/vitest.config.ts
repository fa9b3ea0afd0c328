import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@archive-manifest/utils": fileURLToPath(
        new URL("../utils/src/index.ts", import.meta.url),
      ),
    },
  },
});

import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@opsline/optimize": fileURLToPath(new URL("./packages/optimize/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["tests/**/*.test.ts", "packages/*/__tests__/**/*.test.ts"],
  },
});

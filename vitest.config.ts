import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@seedling/shared": fileURLToPath(new URL("./packages/shared/src/index.ts", import.meta.url)),
      "@seedling/deployer": fileURLToPath(new URL("./packages/deployer/src/index.ts", import.meta.url)),
    },
  },
});

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@dispatch/contracts": workspace("./packages/contracts/src/index.ts"),
      "@dispatch/allocation-engine": workspace("./services/allocation-engine/src/index.ts"),
      "@dispatch/importers": workspace("./packages/importers/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "services/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"]
  }
});

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@shared/core": src("./packages/shared/src/index.ts"),
      "@shared/seed": src("./packages/shared/src/seed.ts"),
      "@sim/core": src("./packages/sim/src/index.ts"),
      "@view/core": src("./packages/view/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"]
  }
});

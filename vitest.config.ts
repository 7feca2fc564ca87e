import path from "node:path";

import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@hedgebot/shared": path.resolve(__dirname, "packages/shared/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["apps/api/src/**/*.test.ts", "packages/shared/src/**/*.test.ts"]
  }
});

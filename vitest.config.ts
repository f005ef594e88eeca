import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@listing-sync/shared-utils": path.resolve(__dirname, "shared-utils/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["shared-utils/tests/**/*.test.ts", "ingestor/tests/**/*.test.ts"],
  },
});

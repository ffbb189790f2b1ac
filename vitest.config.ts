import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["engine/test/**/*.test.ts", "crate-patch/test/**/*.test.ts"],
    environment: "node",
  },
});

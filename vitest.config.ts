import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*_test.ts"],
    testTimeout: 10000,
  },
});

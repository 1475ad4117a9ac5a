import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["ProcessFile/**/*.test.ts", "shared/**/*.test.ts"],
    environment: "node",
    testTimeout: 20000
  }
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    testTimeout: 60000,
    globals: true,
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: [
        "src/core/**/*.ts",
        "src/utils/**/*.ts",
        "src/passive/**/*.ts",
        "src/output/**/*.ts"
      ]
    }
  }
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["formwright-main/tests/**/*.test.ts", "formwright-cli/tests/**/*.test.ts"],
    environment: "node",
  },
});

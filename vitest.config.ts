import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["smartcalc-main/tests/**/*.test.ts", "smartcalc-cli/tests/**/*.test.ts"],
    environment: "node",
  },
});

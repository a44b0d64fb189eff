import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    env: { LOG_LEVEL: "error" },
    include: [
      "__tests__/unit/**/*.test.ts",
      "__tests__/integration/**/*.test.ts",
    ],
    coverage: {
      include: ["lib/**/*.ts"],
      exclude: ["lib/scraper/playwright-adapter.ts"],
    },
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["snow-scraper/src/**/*.test.ts"],
    restoreMocks: true,
  },
});

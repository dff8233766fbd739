import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["shared/**/*.test.ts", "agent/**/*.test.ts"],
    restoreMocks: true,
  },
});

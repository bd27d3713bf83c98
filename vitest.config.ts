import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
    environment: "node",
    env: { LOG_LEVEL: "silent" },
  },
});

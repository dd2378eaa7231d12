import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/*/src/**/*.test.ts"],
    setupFiles: ["apps/simulator/test/setup.ts"],
    environment: "node",
  },
});

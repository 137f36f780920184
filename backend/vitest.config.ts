import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "backend",
    environment: "node",
    include: ["src/**/*.test.ts"],
    setupFiles: ["src/test-helpers/setup.ts"],
  },
});

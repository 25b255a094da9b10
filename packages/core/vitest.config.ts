import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@backtrack/core",
    globals: true,
    environment: "node",
  },
});

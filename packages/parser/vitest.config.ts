import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@backtrack/parser",
    globals: true,
    environment: "node",
  },
});

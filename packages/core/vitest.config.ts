import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@peglogic/core",
    globals: true,
    environment: "node",
  },
});

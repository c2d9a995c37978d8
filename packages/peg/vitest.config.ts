import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@peglogic/peg",
    globals: true,
    environment: "node",
  },
});

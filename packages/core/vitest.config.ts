import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@setwise/core",
    globals: true,
    environment: "node",
  },
});

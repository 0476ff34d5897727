import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@setwise/collections",
    globals: true,
    environment: "node",
  },
});

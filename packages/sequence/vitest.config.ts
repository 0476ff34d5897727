import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@setwise/sequence",
    globals: true,
    environment: "node",
  },
});

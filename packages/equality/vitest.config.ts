import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@setwise/equality",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "setwise",
    globals: true,
    environment: "node",
  },
});

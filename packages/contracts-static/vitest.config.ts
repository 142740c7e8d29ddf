import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@covenant/contracts-static",
    globals: true,
    environment: "node",
  },
});

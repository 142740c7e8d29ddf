import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@covenant/contracts",
    globals: true,
    environment: "node",
  },
});

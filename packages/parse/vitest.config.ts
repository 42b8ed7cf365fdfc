import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@inkwell/parse",
    globals: true,
    environment: "node",
  },
});

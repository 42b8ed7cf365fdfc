import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@inkwell/markup",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@inkwell/config",
    globals: true,
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@knowable/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@knowable/maybe",
    include: ["src/__tests__/**/*.test.ts"],
  },
});

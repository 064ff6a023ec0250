import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "books",
    include: ["tests/**/*.test.ts"],
  },
});

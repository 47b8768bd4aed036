import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@atrium/collections",
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
  },
});

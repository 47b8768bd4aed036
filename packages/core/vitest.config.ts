import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@atrium/core",
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
  },
});

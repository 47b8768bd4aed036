import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@atrium/fsm",
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cli/plc-trend/test/**/*.test.ts"],
    environment: "node",
  },
});

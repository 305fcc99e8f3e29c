import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["core/src/**/*.test.ts", "client/src/**/*.test.ts"],
  },
});

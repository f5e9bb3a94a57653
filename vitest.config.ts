import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["core/src/**/*.test.ts", "worker/src/**/*.test.ts", "client/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: { jsx: "automatic" },
  test: {
    include: ["frontend/src/**/*.test.{ts,tsx}", "bff/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 15_000,
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "extensions/**/*.test.ts"],
    environment: "node",
    // PGlite boots a WASM postgres per test database.
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});

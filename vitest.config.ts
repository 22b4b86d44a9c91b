import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "adapters/*/src/**/*.test.ts",
      "server/src/**/*.test.ts",
    ],
    environment: "node",
    // PGlite boots a WASM Postgres per instance
    testTimeout: 30000,
    hookTimeout: 30000,
  },
})

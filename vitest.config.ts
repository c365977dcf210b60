import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts"],
    testTimeout: 20_000,
    sequence: {
      concurrent: false,
    },
    fileParallelism: false,
  },
})

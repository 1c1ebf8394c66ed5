import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/__tests__/**/*.test.ts", "apps/*/src/**/__tests__/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    // Use forks instead of threads - native modules (sharp) hang with threads
    pool: "forks",
    testTimeout: 10000,
    hookTimeout: 10000,
  },
})

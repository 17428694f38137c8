import { defineConfig } from "vitest/config"
import path from "path"

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    dedupe: ["graphql"],
    alias: {
      // Use source files for proper module resolution during tests
      "@httpql/core": path.resolve(__dirname, "../core/src/index.ts"),
    },
  },
})

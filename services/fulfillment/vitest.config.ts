import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        "src/__tests__/**",
        "src/server.ts",
        "src/cli/main.ts",
        "src/db.ts",
        "src/layers.ts",
        "src/telemetry.ts"
      ]
    }
  }
})

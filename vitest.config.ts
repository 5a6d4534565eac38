import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
    testTimeout: 10000,
    coverage: {
      provider: "v8",
      reportsDirectory: "./coverage",
      reporter: ["text", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        // CLI commands (interactive, hard to test)
        "src/cli/**",
        // Test doubles
        "src/testing/**",
        // Spawns the real yt-dlp binary
        "src/engine/ytDlpEngine.ts",
        "src/config/configManager.ts",
      ],
    },
  },
});

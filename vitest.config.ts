import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["packages/*"],
    // FEATURES_CONFIG and cloud credential variables are stubbed per test.
    unstubEnvs: true,
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "./coverage",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/index.ts", "packages/types/src/**"],
      thresholds: process.env.CI ? { lines: 80, branches: 75 } : undefined,
    },
  },
});

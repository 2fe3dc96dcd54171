import { config as loadDotEnv } from "dotenv";
import { resolve } from "node:path";
import { defineConfig } from "vitest/config";

loadDotEnv({ path: resolve(process.cwd(), ".env.local"), override: false });

export default defineConfig({
  test: {
    testTimeout: 20_000,
    hookTimeout: 20_000,
    include: ["src/**/*.test.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts"],
    },
  },
});

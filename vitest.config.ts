// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env files so VALTREE_* settings reach the tests
  const env = loadEnv(mode, process.cwd(), "");

  return {
    test: {
      env,
      include: ["test/**/*.spec.ts"],
    },
  };
});

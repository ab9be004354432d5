import { defineConfig } from "vitest/config";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    // Run in Node environment for server tests
    environment: "node",

    // Global test utilities (describe, it, expect without imports)
    globals: true,

    // Placeholder env vars and console silencing
    setupFiles: [resolve(__dirname, "__tests__/setup.ts")],

    // Include patterns - use absolute paths
    include: [resolve(__dirname, "__tests__/**/*.test.ts")],

    // Root directory for tests
    root: __dirname,

    testTimeout: 10000,
    hookTimeout: 10000,

    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      include: ["lib/**/*.ts", "stages/**/*.ts", "pipeline/**/*.ts", "routes/**/*.ts", "utils/**/*.ts"],
      exclude: ["__tests__/**"],
    },
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Pin config-sensitive env vars so tests resolve the documented defaults.
    env: {
      SYMCACHE_LOG_LEVEL: "silent",
      SYMCACHE_UPSTREAMS: "",
      SYMCACHE_SYMBOL_PATH: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/server/**/*.ts"],
      reporter: ["text", "text-summary", "lcov"],
    },
    pool: "forks",
    testTimeout: 10000,
  },
});

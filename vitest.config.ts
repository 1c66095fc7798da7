import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/tests/**/*.test.ts"],
    testTimeout: 10000,
    pool: "forks",
    isolate: true,
    env: {
      CACHE_DRIVER: "memory",
      GEOCODE_PROVIDER: "local",
    },
  },
});

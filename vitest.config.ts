import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    globals: true,
    watch: false,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    testTimeout: 20000,
    retry: 3, // Timing assertions use real timers; retry scheduler jitter.
  },
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
});

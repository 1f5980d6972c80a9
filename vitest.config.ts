import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    // SQLite handles are per-file; keep each test file in its own fork
    pool: "forks",
  },
});

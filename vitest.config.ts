import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    pool: "threads",
    include: ["engine/test/**/*.test.ts", "worker/test/**/*.test.ts"],
  },
});

import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

const isCI = process.env.CI === "1" || process.env.CI === "true";
const pool = process.env.VITEST_POOL === "forks" || isCI ? "forks" : "threads";

const here = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "vector-plot-engine": here("./engine/src/index.ts"),
      "vector-plot-canvas": here("./canvas/src/index.ts"),
      "vector-plot-ingestion": here("./ingestion/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["engine/tests/**/*.test.ts", "canvas/tests/**/*.test.ts", "ingestion/tests/**/*.test.ts"],
    pool,
    poolOptions: {
      threads: {
        singleThread: isCI,
      },
      forks: {
        singleFork: true,
      },
    },
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: isCI ? 30000 : 10000,
  },
});

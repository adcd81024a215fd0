import os from "node:os";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const isCI = process.env.CI === "true" || process.env.GITHUB_ACTIONS === "true";
const localWorkers = Math.max(2, Math.min(8, os.cpus().length));

export default defineConfig({
  resolve: {
    alias: {
      "#taskhooks": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    testTimeout: 30_000,
    unstubEnvs: true,
    unstubGlobals: true,
    pool: "forks",
    poolOptions: {
      forks: {
        maxForks: isCI ? 2 : localWorkers,
      },
    },
    include: ["src/**/*.test.ts", "test/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    exclude: ["dist/**", "**/node_modules/**"],
  },
});

import { defineConfig, mergeConfig } from "vitest/config";
import viteConfig from "./vite.config.js";

export default mergeConfig(
  viteConfig,
  defineConfig({
    test: {
      include: [
        "packages/*/src/**/__tests__/**/*.test.ts",
        "apps/*/src/**/__tests__/**/*.test.ts",
      ],
      pool: "threads",
      hookTimeout: 30000,
    },
  }),
);

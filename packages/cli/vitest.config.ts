// pattern: Imperative Shell
import { defineConfig, mergeConfig } from "vitest/config";

import workspaceConfig from "../../vitest.config.js";

export default mergeConfig(
  workspaceConfig,
  defineConfig({
    test: {
      // to reduce context burden when reading failures
      silent: "passed-only",
      // File patterns - only this package
      include: ["src/**/*.{test,spec}.ts"],
      exclude: ["node_modules", "dist"],
    },
  })
);

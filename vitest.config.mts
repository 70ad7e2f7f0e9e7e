// vitest.config.mts
//
// Vitest configuration for java-frontend.
// - TypeScript-first, Node environment
// - "@/..." imports resolved from tsconfig.json paths
// - v8 coverage over src/

import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],

  test: {
    globals: true,

    environment: "node",

    include: ["tests/**/*.spec.ts"],

    exclude: ["node_modules", "dist", "coverage", ".git"],

    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts", "src/index.ts"],
    },

    clearMocks: true,
    restoreMocks: true,
  },
});

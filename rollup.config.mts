// rollup.config.mts
//
// Rollup configuration for java-frontend.
//
// - ESM and CJS bundles from src/index.ts
// - Node built-ins and declared dependencies stay external
// - The lexical tables in src/core/lexicon.json are inlined by @rollup/plugin-json
//
//   npm run bundle

import { defineConfig } from "rollup";
import typescript from "@rollup/plugin-typescript";
import commonjs from "@rollup/plugin-commonjs";
import { nodeResolve } from "@rollup/plugin-node-resolve";
import json from "@rollup/plugin-json";
import { builtinModules } from "node:module";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface PackageManifest {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
}

const pkg: PackageManifest = JSON.parse(
  readFileSync(resolve(__dirname, "package.json"), "utf8"),
);

const external = [
  ...builtinModules,
  ...builtinModules.map((m) => `node:${m}`),
  ...Object.keys(pkg.dependencies ?? {}),
  ...Object.keys(pkg.peerDependencies ?? {}),
];

export default defineConfig({
  input: resolve(__dirname, "src/index.ts"),

  external,

  output: [
    {
      file: "dist/index.mjs",
      format: "esm",
      sourcemap: true,
      exports: "named",
    },
    {
      file: "dist/index.cjs",
      format: "cjs",
      sourcemap: true,
      exports: "named",
    },
  ],

  plugins: [
    nodeResolve({
      extensions: [".mjs", ".js", ".json", ".ts"],
      preferBuiltins: true,
    }),

    commonjs(),

    json({ preferConst: true }),

    // tsconfig.json is type-check only (noEmit); bundling needs emit.
    typescript({
      tsconfig: "./tsconfig.json",
      include: ["src/**/*.ts"],
      noEmit: false,
      declaration: false,
      outDir: "dist",
    }),
  ],

  treeshake: {
    moduleSideEffects: false,
    propertyReadSideEffects: false,
  },

  preserveEntrySignatures: "exports-only",
});

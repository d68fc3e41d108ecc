import { tmpdir } from "node:os";
import { join } from "node:path";

import ts from "typescript";
import { defineConfig, type Plugin } from "vitest/config";

/**
 * Transpile TypeScript with tsc (as the production build does) instead of
 * esbuild: esbuild renames shadowing parameters (e.g. `store` -> `store2`),
 * which breaks awilix CLASSIC-mode injection by parameter name.
 */
function tscTranspile(): Plugin {
  return {
    name: "tsc-transpile",
    enforce: "pre",
    transform(code, id) {
      const file = id.split("?")[0];
      if (!/\.[cm]?ts$/.test(file) || file.endsWith(".d.ts")) return null;
      const out = ts.transpileModule(code, {
        fileName: file,
        compilerOptions: {
          target: ts.ScriptTarget.ES2022,
          module: ts.ModuleKind.ESNext,
          esModuleInterop: true,
          sourceMap: true,
          inlineSources: true
        }
      });
      return { code: out.outputText, map: out.sourceMapText ? JSON.parse(out.sourceMapText) : null };
    }
  };
}

export default defineConfig({
  esbuild: false,
  plugins: [tscTranspile()],
  test: {
    include: ["tests/**/*.spec.ts"],
    environment: "node",
    globals: false,
    env: {
      SHIPGATE_HOME: join(tmpdir(), "shipgate-vitest-home"),
      LOG_LEVEL: "silent"
    }
  }
});

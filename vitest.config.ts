import ts from "typescript";
import { defineConfig } from "vitest/config";

// Transpile TypeScript with the compiler itself rather than esbuild: esbuild
// renames shadowed parameters, which changes what Function#toString reports.
export default defineConfig({
  esbuild: false,
  plugins: [
    {
      name: "typescript-transpile",
      transform(code, id) {
        if (!/\.[cm]?ts$/.test(id.split("?")[0] ?? "")) return null;
        const result = ts.transpileModule(code, {
          fileName: id,
          compilerOptions: {
            target: ts.ScriptTarget.ES2022,
            module: ts.ModuleKind.ESNext,
            sourceMap: true,
            inlineSources: true,
          },
        });
        return { code: result.outputText, map: result.sourceMapText };
      },
    },
  ],
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
  },
});

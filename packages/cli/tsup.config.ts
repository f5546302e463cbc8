import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  clean: true,
  noExternal: ["@gatewise/engine"],
  banner: {
    js: [
      "import{createRequire as __cjs_createRequire}from'module';",
      "const require=__cjs_createRequire(import.meta.url);",
    ].join(""),
  },
});

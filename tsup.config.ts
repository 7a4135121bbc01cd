import { defineConfig } from "tsup";

export default defineConfig({
    entry: { "cli/index": "src/cli/index.ts", index: "src/index.ts" },
    format: ["esm"],
    dts: true,
    sourcemap: true,
    clean: true,
    minify: false,
    banner: { js: "#!/usr/bin/env node" }
});

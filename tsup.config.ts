import { defineConfig } from "tsup";

export default defineConfig({
  entry: [
    "src/index.ts",
    "src/providers/niconico/index.ts"
  ],
  format: ["esm", "cjs"],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  outDir: "bundle",
  target: "es2022",
  external: ["events", "pino", "zod", "protobufjs/minimal.js"],
});

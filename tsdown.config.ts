import { defineConfig } from "tsdown"

export default defineConfig({
  entry: ["src/main.ts", "src/index.ts"],

  format: ["esm"],
  target: "es2022",
  platform: "node",

  dts: true,
  sourcemap: true,
  clean: true,
})

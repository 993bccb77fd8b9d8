import { defineConfig } from "tsdown";

export default defineConfig({
  entry: "src/index.ts",
  outDir: "dist",
  platform: "node",
  target: "node20",
  fixedExtension: false,
  env: {
    NODE_ENV: "production",
  },
  banner: "#!/usr/bin/env node",
});

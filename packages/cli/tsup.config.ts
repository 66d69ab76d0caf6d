import { defineConfig } from "tsup";
import { copyLicenseCatalog } from "./src/build/copy-license-catalog.js";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  target: "node20",
  noExternal: [/^@depintel\//],
  dts: true,
  sourcemap: true,
  clean: true,
  banner: {
    js: "#!/usr/bin/env node",
  },
  // the license catalog is read from ../data relative to the bundled module
  onSuccess: async () => {
    copyLicenseCatalog("../analysis-engine/src/data", "./data");
  },
});

import { defineConfig } from "tsdown";

export default defineConfig({
	entry: {
		"core/index": "./src/core/index.ts",
		"fs/index": "./src/fs/index.ts",
	},
	platform: "node",
	format: "esm",
	outDir: "dist",
	dts: true,
});

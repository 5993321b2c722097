import { defineConfig } from "vite";

export default defineConfig({
	build: {
		lib: {
			entry: "src/Main.ts",
			formats: ["es"],
			fileName: "index",
		},
		outDir: "dist",
		minify: false,
		target: "node20",
		ssr: true,
		sourcemap: true,
		rollupOptions: {
			external: [/^node:.*/, "@anthropic-ai/sdk", "commander", "dotenv", "pino", "zod", "zod-to-json-schema"],
			output: {
				banner: "#!/usr/bin/env node",
			},
		},
	},
});

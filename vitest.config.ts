import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		env: {
			LOG_LEVEL: "silent",
		},
		restoreMocks: true,
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			exclude: ["**/*.test.ts", "**/Types.ts", "src/Main.ts", "vite.config.ts", "vitest.config.ts"],
		},
	},
});

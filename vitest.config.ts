import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: true,
		environment: "node",
		testTimeout: 30000,
		hookTimeout: 30000,
		env: {
			TUNEFORGE_LOG_LEVEL: "warn",
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "json-summary", "html"],
			reportsDirectory: "./coverage",
			exclude: [
				"**/*.test.ts",
				"**/node_modules/**",
				"**/dist/**",
				// Barrel index files (re-exports only)
				"**/packages/*/src/index.ts",
				"**/packages/*/src/*/index.ts",
				// Interface/type-only files
				"**/packages/logger/src/types.ts",
				"**/packages/tuner/src/strategies/types.ts",
			],
		},
	},
	resolve: {
		extensions: [".ts", ".js", ".json"],
	},
});

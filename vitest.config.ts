import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		// The loop tests swap globals (fetch, LOG_LEVEL); keep files in one process, one at a time
		pool: "forks",
		poolOptions: {
			forks: {
				singleFork: true,
			},
		},
		sequence: {
			concurrent: false,
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/*.test.ts", "**/index.ts", "**/cli.ts"],
		},
		testTimeout: 30000,
		hookTimeout: 30000,
	},
});

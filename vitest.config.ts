import { defineConfig } from "vitest/config";

/**
 * Root vitest config covering package unit tests and app integration tests.
 * Integration tests run against an in-memory libsql database.
 */
export default defineConfig({
	test: {
		include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
		environment: "node",
		coverage: {
			provider: "v8",
			reporter: ["text", "text-summary", "html", "json"],
			reportsDirectory: "./coverage",
			include: ["packages/*/src/**/*.ts", "apps/*/src/**/*.ts"],
			exclude: ["packages/*/src/**/index.ts", "packages/types/**", "**/*.d.ts"],
		},
	},
});

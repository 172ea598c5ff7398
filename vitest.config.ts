import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: [
			"packages/shared/tests/**/*.{test,spec}.ts",
			"apps/backend/tests/**/*.{test,spec}.ts"
		],
		exclude: ["**/node_modules/**", "**/dist/**"],
		testTimeout: 10_000
	}
});

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		// PGlite needs a moment to start
		testTimeout: 30_000,
		hookTimeout: 30_000,
	},
});

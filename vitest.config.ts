// CHANGE: Vitest configuration for the gate
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution; each test cleans up its temporary project

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: 100% coverage for CORE, a floor for SHELL
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts", "src/index.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
			},
		},

		// Prevent test contamination between console spies
		clearMocks: true,
		restoreMocks: true,
	},
});

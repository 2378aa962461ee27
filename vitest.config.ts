// CHANGE: Vitest configuration for hill-lab
// WHY: Native ESM, explicit test imports, property tests under fast-check
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without shared state between tests
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Coverage focused on CORE
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: every exported operation is reached by a test
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts", "scripts/**/*.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 100,
					lines: 95,
					statements: 95,
				},
			},
		},

		// CHANGE: Clear mocks between tests
		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});

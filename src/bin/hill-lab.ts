#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// FORMAT THEOREM: ∀run ∈ App: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { main } from "../app/runHillLab.js";

/**
 * CLI entry point for hill-lab.
 *
 * @remarks
 * - @pure false (contains side effects: process termination and console I/O)
 * - @invariant exit code is 1 for bad input or a refused decryption, otherwise 0
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(main());
		// Shell boundary: single process exit
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();

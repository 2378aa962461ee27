// CHANGE: Pure decision function computing the exit code of a command run
// SOURCE: https://effect.website/docs/introduction
// FORMAT THEOREM: ∀s ∈ State: (s.failed ∨ s.decryptionRefused) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from the command outcome (pure function).
 *
 * @param state - Immutable flags computed from the command outcome
 * @returns 1 if the command failed or a decrypt was refused; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition (state.failed ∨ state.decryptionRefused) → result = 1
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ failed: false, decryptionRefused: true }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.failed || s.decryptionRefused,
		(refused): ExitCode => (refused ? 1 : 0),
	);

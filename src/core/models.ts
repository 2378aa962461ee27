// CHANGE: Functional Core decision models (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the hill-lab process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing an exit code from a command run.
 *
 * @remarks
 * - @pure true
 * - @precondition flags are computed from the command outcome deterministically
 * - @invariant state is immutable
 *
 * @property failed The command could not produce its result (bad input, bad config)
 * @property decryptionRefused A decrypt command hit a key that is not invertible mod m
 */
export interface DecisionState {
	readonly failed: boolean;
	readonly decryptionRefused: boolean;
}

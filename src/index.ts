// CHANGE: Public API entry point for library consumers
// WHY: Export the pure cipher engine and the APP orchestrator, hide SHELL internals
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or the Effect-returning runner
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs one hill-lab command and returns its exit code.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runHillLab } from "hill-nullity-lab";
 *
 * const exitCode = await Effect.runPromise(
 *   runHillLab({
 *     command: "explain",
 *     key: "1,2;3,4",
 *     preset: null,
 *     message: null,
 *     cipher: null,
 *     base: null,
 *     overrides: {},
 *     configPath: null,
 *   }),
 * );
 * ```
 *
 * @pure false - reads the config file and prints to the console
 * @returns Effect<ExitCode, never>
 */
export { resolveKey, runHillLab } from "./app/runHillLab.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type { DecisionState, ExitCode } from "./core/models.js";
export type {
	CipherConfig,
	CipherConfigInput,
	CLIOptions,
	Collision,
	Command,
	ConfigBase,
	Decryption,
	DiagnosticReport,
	EncodedMessage,
	EncryptionResult,
	Matrix,
	Point,
	SymbolPolicy,
	UnitSquareImage,
	Vector,
	Verdict,
} from "./core/types/index.js";

/**
 * Tagged errors; every failing engine call returns one of these in an Either.
 *
 * @pure true
 */
export {
	ConfigError,
	DimensionMismatchError,
	InvalidSymbolError,
	MatrixParseError,
	NotInvertibleError,
	UsageError,
} from "./core/errors.js";
export type { AppError, CipherError } from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure Cipher Engine)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Key analysis over the integers and modulo m.
 *
 * @example
 * ```typescript
 * determinant([[1, 2], [3, 4]]); // -2n
 * isKeyValid([[3, 3], [2, 5]], 26); // true
 * ```
 */
export { determinant, nullity, rank } from "./core/matrix/determinant.js";
export {
	isKeyValid,
	modInverseMatrix,
	modInverseScalar,
} from "./core/matrix/modular.js";
export { validateKey } from "./core/matrix/validate.js";

/**
 * Encryption and decryption.
 *
 * @example
 * ```typescript
 * encode("HI", [[3, 3], [2, 5]], STANDARD_CONFIG); // Right({ cipherText: "TC", ... })
 * ```
 */
export { decode, decryptText, encode, encrypt } from "./core/cipher/hill.js";
export {
	CONFIG_BASES,
	makeCipherConfig,
	SPACED_CONFIG,
	STANDARD_CONFIG,
} from "./core/config.js";

/**
 * Explanations, collisions, geometry and presets.
 */
export { diagnose, explain } from "./core/explain/report.js";
export {
	COLLISION_SEARCH_LIMIT,
	findCollision,
	findKernelVector,
} from "./core/explain/collision.js";
export { lessonFor } from "./core/explain/lesson.js";
export type { LessonSection } from "./core/explain/lesson.js";
export { transformUnitSquare } from "./core/geometry/unit-square.js";
export { parseMatrix } from "./core/parse/matrix.js";
export { findPreset, presets } from "./core/presets.js";
export type { Preset, PresetName } from "./core/presets.js";

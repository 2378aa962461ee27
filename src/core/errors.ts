// CHANGE: Typed domain error ADT for the matrix cipher core using Effect.Data
// WHY: Failures are values the front end renders verbatim, never runtime exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Message contains a character outside the configured alphabet.
 *
 * @pure true (Data class)
 * @invariant symbol.length === 1 ∧ position >= 0
 */
export class InvalidSymbolError extends Data.TaggedError("InvalidSymbol")<{
	readonly symbol: string;
	readonly position: number;
}> {}

/**
 * Key matrix is empty, ragged, not square, holds non-integers,
 * or is not of the configured size n.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class DimensionMismatchError extends Data.TaggedError(
	"DimensionMismatch",
)<{
	readonly expected: number | null;
	readonly rows: number;
	readonly columns: number;
	readonly detail: string;
}> {}

/**
 * Value has no inverse modulo `modulus`.
 *
 * `scope: "scalar"` comes from modInverseScalar; `scope: "matrix"` is what
 * decode reports after translating the scalar failure for a key matrix.
 *
 * @pure true (Data class)
 * @invariant gcd !== 1
 */
export class NotInvertibleError extends Data.TaggedError("NotInvertible")<{
	readonly scope: "scalar" | "matrix";
	readonly value: number;
	readonly modulus: number;
	readonly gcd: number;
	readonly detail: string;
}> {}

/**
 * Textual matrix could not be read as rows of integers.
 *
 * @pure true (Data class)
 */
export class MatrixParseError extends Data.TaggedError("MatrixParse")<{
	readonly input: string;
	readonly detail: string;
}> {}

/**
 * Cipher configuration violates its invariants or could not be read.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("Config")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Command line could not be turned into a runnable command.
 *
 * @pure true (Data class)
 */
export class UsageError extends Data.TaggedError("Usage")<{
	readonly detail: string;
}> {}

/**
 * Errors the cipher engine itself can produce.
 */
export type CipherError =
	| InvalidSymbolError
	| DimensionMismatchError
	| NotInvertibleError;

/**
 * Union type of all application errors for Effect signatures
 *
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| CipherError
	| MatrixParseError
	| ConfigError
	| UsageError;

// CHANGE: Result shapes returned by the engine to the presentation layer
// PURITY: CORE
// INVARIANT: All structures are immutable and created fresh per call

import type { NotInvertibleError } from "../errors.js";
import type { Matrix, Vector } from "./matrix.js";

/**
 * Why a key does or does not work for the cipher.
 *
 * - `invertible`: gcd(det mod m, m) = 1
 * - `singular`: det = 0 over the integers
 * - `shares-factor`: det ≠ 0 but gcd(det mod m, m) > 1
 */
export type Verdict = "invertible" | "singular" | "shares-factor";

/**
 * Algebraic properties of a key matrix, for display.
 *
 * @invariant rank + nullity === dimension
 * @invariant keyValid ⇔ gcd === 1 ⇔ inverse !== null
 * @invariant determinant === 0n ⇒ verdict === "singular"
 */
export interface DiagnosticReport {
	readonly matrix: Matrix;
	readonly dimension: number;
	readonly modulus: number;
	readonly determinant: bigint;
	readonly determinantMod: number;
	readonly gcd: number;
	readonly rank: number;
	readonly nullity: number;
	readonly singular: boolean;
	readonly keyValid: boolean;
	readonly verdict: Verdict;
	readonly inverse: Matrix | null;
	readonly rationale: ReadonlyArray<string>;
}

/**
 * Message after normalization, padding and the block transform.
 *
 * @property original Input text as given
 * @property normalized Uppercased text restricted to the alphabet
 * @property padded normalized + pad symbols up to a multiple of n
 * @property symbols Integer value of every padded symbol
 * @property blocks (M · v) mod m for each block v of `symbols`
 * @property cipherText Blocks rendered back through the alphabet
 * @property spacePositions Indices of spaces dropped under the `strip` policy, counted in the text with spaces restored
 */
export interface EncodedMessage {
	readonly original: string;
	readonly normalized: string;
	readonly padded: string;
	readonly symbols: Vector;
	readonly blocks: ReadonlyArray<Vector>;
	readonly cipherText: string;
	readonly spacePositions: ReadonlyArray<number>;
}

/**
 * Outcome of trying to undo an encoding.
 */
export type Decryption =
	| {
			readonly _tag: "Decrypted";
			readonly blocks: ReadonlyArray<Vector>;
			readonly message: string;
	  }
	| {
			readonly _tag: "Impossible";
			readonly error: NotInvertibleError;
	  };

/**
 * Encode + attempted decode, with the key's diagnostics attached.
 */
export interface EncryptionResult {
	readonly encoded: EncodedMessage;
	readonly report: DiagnosticReport;
	readonly decryption: Decryption;
}

/**
 * Two distinct plaintext blocks that a key maps to the same cipher block.
 *
 * @invariant M · kernel ≡ 0 (mod m) ∧ kernel ≠ 0
 * @invariant second ≡ first + kernel (mod m) ∧ M·first ≡ M·second ≡ cipherBlock
 */
export interface Collision {
	readonly kernel: Vector;
	readonly first: Vector;
	readonly second: Vector;
	readonly firstText: string;
	readonly secondText: string;
	readonly cipherBlock: Vector;
}

/**
 * 2-D point.
 */
export interface Point {
	readonly x: number;
	readonly y: number;
}

/**
 * Image of the unit square under a 2×2 key.
 *
 * @invariant signedArea === det(M)
 * @invariant collapse === "none" ⇔ signedArea !== 0n
 */
export interface UnitSquareImage {
	readonly original: ReadonlyArray<Point>;
	readonly transformed: ReadonlyArray<Point>;
	readonly signedArea: bigint;
	readonly collapse: "none" | "line" | "point";
}

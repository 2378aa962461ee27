// CHANGE: Diagnostic report for a key matrix (determinant, rank, nullity, verdict, rationale)
// WHY: Real singularity and non-invertibility mod m are different properties and are reported separately
// FORMAT THEOREM: verdict = singular ⇔ det = 0; verdict = invertible ⇔ gcd(det mod m, m) = 1
// PURITY: CORE
// INVARIANT: report.rank + report.nullity = report.dimension
// COMPLEXITY: O(n³) dominated by rank and the adjugate

import { Either, pipe } from "effect";
import { match } from "ts-pattern";

import type { DimensionMismatchError } from "../errors.js";
import { gcd, modBig, primeFactors } from "../matrix/arithmetic.js";
import { determinant, rank } from "../matrix/determinant.js";
import { modInverseMatrix } from "../matrix/modular.js";
import { validateKey } from "../matrix/validate.js";
import type {
	CipherConfig,
	DiagnosticReport,
	Matrix,
	Verdict,
} from "../types/index.js";

export interface KeyFacts {
	readonly dimension: number;
	readonly modulus: number;
	readonly determinant: bigint;
	readonly determinantMod: number;
	readonly gcd: number;
	readonly rank: number;
	readonly nullity: number;
}

const verdictOf = (facts: KeyFacts): Verdict => {
	if (facts.determinant === 0n) return "singular";
	return facts.gcd === 1 ? "invertible" : "shares-factor";
};

/**
 * Human-readable lines explaining the verdict.
 *
 * @pure true
 * @postcondition result.length >= 3
 */
export function rationaleFor(verdict: Verdict, facts: KeyFacts): ReadonlyArray<string> {
	const m = facts.modulus;
	const summary = [
		`det(M) = ${facts.determinant}; det mod ${m} = ${facts.determinantMod}; gcd(${facts.determinantMod}, ${m}) = ${facts.gcd}.`,
		`rank = ${facts.rank}, nullity = ${facts.nullity} (rank + nullity = ${facts.dimension}).`,
	];
	const detail = match(verdict)
		.with("singular", () => [
			`det = 0: the key is singular over the reals, so it has no inverse modulo any m > 1.`,
			`nullity > 0: the key matrix maps multiple distinct plaintext blocks to the same ciphertext block, so decryption cannot recover the original message uniquely.`,
		])
		.with("shares-factor", () => [
			`det ≠ 0, so the key is invertible over the reals, but det mod ${m} shares the factor ${primeFactors(facts.gcd).join(" × ")} with ${m}.`,
			`det has no inverse modulo ${m}, so no inverse key exists: distinct plaintext blocks collide modulo ${m} even though nullity is 0.`,
		])
		.with("invertible", () => [
			`gcd(det mod ${m}, ${m}) = 1: the inverse key det⁻¹ · adj(M) mod ${m} exists and decryption recovers every message.`,
		])
		.exhaustive();
	return [...summary, ...detail];
}

/**
 * Assembles the diagnostic report for an already validated key.
 *
 * @pure true
 */
export function diagnose(matrix: Matrix, modulus: number): DiagnosticReport {
	const det = determinant(matrix);
	const determinantMod = modBig(det, modulus);
	const r = rank(matrix);
	const facts: KeyFacts = {
		dimension: matrix.length,
		modulus,
		determinant: det,
		determinantMod,
		gcd: gcd(determinantMod, modulus),
		rank: r,
		nullity: matrix.length - r,
	};
	const verdict = verdictOf(facts);
	const inverse = pipe(modInverseMatrix(matrix, modulus), Either.getOrNull);

	return {
		...facts,
		matrix,
		singular: det === 0n,
		keyValid: inverse !== null,
		verdict,
		inverse,
		rationale: rationaleFor(verdict, facts),
	};
}

/**
 * Determinant, rank, nullity, invertibility verdict and rationale for a key.
 *
 * @returns DiagnosticReport, or DimensionMismatchError when the key is not a valid square matrix
 *
 * @pure true
 *
 * @example
 * ```ts
 * explain([[1, 2], [3, 4]], STANDARD_CONFIG);
 * // Right({ determinant: -2n, determinantMod: 24, gcd: 2, verdict: "shares-factor", keyValid: false, ... })
 * ```
 */
export const explain = (
	matrix: Matrix,
	config: CipherConfig,
): Either.Either<DiagnosticReport, DimensionMismatchError> =>
	pipe(
		validateKey(matrix, config.dimension),
		Either.map((key) => diagnose(key, config.modulus)),
	);

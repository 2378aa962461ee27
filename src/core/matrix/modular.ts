// CHANGE: Modular inverses of scalars and key matrices over Z_m
// SOURCE: https://en.wikipedia.org/wiki/Hill_cipher#Decryption
// FORMAT THEOREM: gcd(det(M) mod m, m) = 1 ⇔ ∃K: K·M ≡ M·K ≡ I (mod m), with K = det⁻¹ · adj(M) mod m
// PURITY: CORE
// INVARIANT: Singular keys (det = 0) are never valid since gcd(0, m) = m > 1
// COMPLEXITY: O(n² · cost(determinant(n−1))) for the adjugate

import { Either, pipe } from "effect";

import { NotInvertibleError } from "../errors.js";
import type { Matrix } from "../types/index.js";
import { extendedGcd, gcd, mod, modBig } from "./arithmetic.js";
import { determinant, minor } from "./determinant.js";

/**
 * Inverse of `a` modulo `m` by extended Euclid.
 *
 * @returns a⁻¹ in [0, m), or a scalar NotInvertibleError when gcd(a, m) ≠ 1
 *
 * @pure true
 * @precondition m >= 1
 * @postcondition Right(x) ⇒ (a · x) mod m === 1 mod m
 *
 * @example
 * ```ts
 * modInverseScalar(9, 26);  // Right(3)
 * modInverseScalar(24, 26); // Left(NotInvertibleError { gcd: 2 })
 * ```
 */
export function modInverseScalar(
	a: number,
	m: number,
): Either.Either<number, NotInvertibleError> {
	const residue = mod(a, m);
	const bezout = extendedGcd(residue, m);
	if (bezout.gcd !== 1) {
		return Either.left(
			new NotInvertibleError({
				scope: "scalar",
				value: residue,
				modulus: m,
				gcd: bezout.gcd,
				detail: `${residue} has no inverse modulo ${m} because gcd(${residue}, ${m}) = ${bezout.gcd}`,
			}),
		);
	}
	return Either.right(mod(bezout.x, m));
}

/**
 * Governing invertibility predicate for the cipher.
 *
 * @pure true
 * @invariant determinant(M) === 0 ⇒ isKeyValid(M, m) === false for m > 1
 */
export const isKeyValid = (matrix: Matrix, m: number): boolean =>
	gcd(modBig(determinant(matrix), m), m) === 1;

/**
 * Classical adjoint: adj(M)[j][i] = (−1)^{i+j} · det(minor(M, i, j)), exact.
 *
 * @pure true
 * @postcondition M · adj(M) = det(M) · I over the integers
 */
export function adjugate(matrix: Matrix): ReadonlyArray<ReadonlyArray<bigint>> {
	const n = matrix.length;
	if (n === 1) return [[1n]];
	return matrix.map((_, j) =>
		matrix.map((__, i) => {
			const cofactor = determinant(minor(matrix, i, j));
			return (i + j) % 2 === 0 ? cofactor : -cofactor;
		}),
	);
}

/**
 * Inverse of a key matrix modulo `m`: det⁻¹ · adj(M), every entry in [0, m).
 *
 * The scalar failure of det⁻¹ is reported as a matrix-scope NotInvertibleError.
 *
 * @pure true
 * @precondition matrix passed validateKey
 * @postcondition Right(K) ⇒ (K · M) mod m === I
 */
export function modInverseMatrix(
	matrix: Matrix,
	m: number,
): Either.Either<Matrix, NotInvertibleError> {
	const det = determinant(matrix);
	return pipe(
		modInverseScalar(modBig(det, m), m),
		Either.mapLeft(
			(scalar) =>
				new NotInvertibleError({
					scope: "matrix",
					value: scalar.value,
					modulus: m,
					gcd: scalar.gcd,
					detail:
						det === 0n
							? `key matrix is singular (det = 0), so it has no inverse modulo ${m}`
							: `det = ${det} ≡ ${scalar.value} (mod ${m}) and gcd(${scalar.value}, ${m}) = ${scalar.gcd}, so the key has no inverse modulo ${m}`,
				}),
		),
		Either.map((detInverse) =>
			adjugate(matrix).map((row) =>
				row.map((entry) => mod(detInverse * modBig(entry, m), m)),
			),
		),
	);
}

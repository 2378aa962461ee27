// CHANGE: Witness search for the many-to-one behaviour of a non-invertible key
// FORMAT THEOREM: ¬isKeyValid(M, m) ⇒ ∃k ≠ 0: M·k ≡ 0 (mod m), hence M·x ≡ M·(x + k) for every block x
// PURITY: CORE
// INVARIANT: Some(c) ⇒ c.first ≠ c.second ∧ M·c.first ≡ M·c.second ≡ c.cipherBlock (mod m)
// COMPLEXITY: O(min(m^n, COLLISION_SEARCH_LIMIT) · n²)

import { Either, Option, pipe } from "effect";

import { indicesToSymbols } from "../cipher/alphabet.js";
import type { DimensionMismatchError } from "../errors.js";
import { mod, multiplyVectorMod } from "../matrix/arithmetic.js";
import { isKeyValid } from "../matrix/modular.js";
import { validateKey } from "../matrix/validate.js";
import type { CipherConfig, Collision, Matrix, Vector } from "../types/index.js";

/**
 * Largest number of candidate kernel vectors examined.
 */
export const COLLISION_SEARCH_LIMIT = 1_000_000;

/**
 * Little-endian base-m digits of `t`, padded to n.
 */
const digitsOf = (t: number, m: number, n: number): Vector =>
	Array.from({ length: n }, (_, j) => Math.floor(t / m ** j) % m);

/**
 * First non-zero k (in little-endian counting order) with M·k ≡ 0 (mod m).
 *
 * @pure true
 */
export function findKernelVector(matrix: Matrix, m: number): Option.Option<Vector> {
	const n = matrix.length;
	const total = Math.min(m ** n, COLLISION_SEARCH_LIMIT);
	for (let t = 1; t < total; t++) {
		const candidate = digitsOf(t, m, n);
		if (multiplyVectorMod(matrix, candidate, m).every((x) => x === 0)) {
			return Option.some(candidate);
		}
	}
	return Option.none();
}

/**
 * Two distinct plaintext blocks that encrypt to the same cipher block.
 *
 * @param base Block the first plaintext is built from; defaults to all zeros
 * @returns None when the key is valid (the transform is a bijection) or no
 *          kernel vector lies within the search limit
 *
 * @pure true
 *
 * @example
 * ```ts
 * findCollision([[1, 2], [2, 4]], STANDARD_CONFIG);
 * // Right(Some({ kernel: [24, 1], firstText: "AA", secondText: "YB", cipherBlock: [0, 0] }))
 * ```
 */
export const findCollision = (
	key: Matrix,
	config: CipherConfig,
	base?: Vector,
): Either.Either<Option.Option<Collision>, DimensionMismatchError> =>
	pipe(
		validateKey(key, config.dimension),
		Either.map((validKey): Option.Option<Collision> => {
			const m = config.modulus;
			if (isKeyValid(validKey, m)) return Option.none();
			const first = validKey.map((_, i) => mod(base?.[i] ?? 0, m));
			return pipe(
				findKernelVector(validKey, m),
				Option.map(
					(kernel): Collision => {
						const second = first.map((x, i) => mod(x + (kernel[i] ?? 0), m));
						return {
							kernel,
							first,
							second,
							firstText: indicesToSymbols(first, config),
							secondText: indicesToSymbols(second, config),
							cipherBlock: multiplyVectorMod(validKey, first, m),
						};
					},
				),
			);
		}),
	);

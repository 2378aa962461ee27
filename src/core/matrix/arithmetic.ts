// CHANGE: Integer and modular arithmetic primitives for the cipher core
// SOURCE: https://en.wikipedia.org/wiki/Extended_Euclidean_algorithm
// FORMAT THEOREM: ∀a,b: a·x + b·y = gcd(a,b) where {x,y} = extendedGcd(a,b)
// PURITY: CORE
// INVARIANT: All functions are total over safe integers and deterministic
// COMPLEXITY: O(log min(a,b)) for gcd family, O(√n) for primeFactors

import type { Matrix, Vector } from "../types/index.js";

/**
 * Least non-negative residue of `a` modulo `m`.
 *
 * @pure true
 * @precondition m > 0
 * @postcondition 0 <= result < m
 *
 * @example
 * ```ts
 * mod(-2, 26); // 24
 * ```
 */
export const mod = (a: number, m: number): number => ((a % m) + m) % m;

/**
 * Residue of an exact `bigint` value, returned as a number in [0, m).
 *
 * @pure true
 * @precondition m > 0
 *
 * @example
 * ```ts
 * modBig(10000000400000003n, 26); // 3
 * ```
 */
export const modBig = (a: bigint, m: number): number => {
	const big = BigInt(m);
	return Number(((a % big) + big) % big);
};

/**
 * Greatest common divisor of |a| and |b|; gcd(0, m) = |m|.
 *
 * @pure true
 * @postcondition result >= 0
 */
export function gcd(a: number, b: number): number {
	let x = Math.abs(a);
	let y = Math.abs(b);
	while (y !== 0) {
		[x, y] = [y, x % y];
	}
	return x;
}

/**
 * Bézout coefficients.
 *
 * @pure true
 * @invariant a·x + b·y === gcd
 */
export interface Bezout {
	readonly gcd: number;
	readonly x: number;
	readonly y: number;
}

/**
 * Extended Euclid on non-negative inputs.
 *
 * @pure true
 * @precondition a >= 0 ∧ b >= 0
 * @complexity O(log min(a, b))
 */
export function extendedGcd(a: number, b: number): Bezout {
	let [oldR, r] = [a, b];
	let [oldS, s] = [1, 0];
	let [oldT, t] = [0, 1];
	while (r !== 0) {
		const q = Math.floor(oldR / r);
		[oldR, r] = [r, oldR - q * r];
		[oldS, s] = [s, oldS - q * s];
		[oldT, t] = [t, oldT - q * t];
	}
	return { gcd: oldR, x: oldS, y: oldT };
}

/**
 * Distinct prime factors in ascending order.
 *
 * @pure true
 * @example primeFactors(26) → [2, 13]
 */
export function primeFactors(n: number): ReadonlyArray<number> {
	const factors: number[] = [];
	let rest = Math.abs(n);
	for (let p = 2; p * p <= rest; p++) {
		if (rest % p === 0) {
			factors.push(p);
			while (rest % p === 0) rest /= p;
		}
	}
	if (rest > 1) factors.push(rest);
	return factors;
}

/**
 * (M · v) mod m with every component in [0, m).
 *
 * Entries are reduced before multiplying so intermediate sums stay below n·m².
 *
 * @pure true
 * @precondition v.length === M.length
 * @complexity O(n²)
 */
export const multiplyVectorMod = (
	matrix: Matrix,
	vector: Vector,
	m: number,
): Vector =>
	matrix.map((row) =>
		mod(
			row.reduce(
				(acc, entry, j) => acc + mod(entry, m) * mod(vector[j] ?? 0, m),
				0,
			),
			m,
		),
	);

/**
 * Every entry of M reduced into [0, m).
 *
 * @pure true
 */
export const reduceMatrix = (matrix: Matrix, m: number): Matrix =>
	matrix.map((row) => row.map((entry) => mod(entry, m)));

// CHANGE: Exact integer determinant, rank and nullity over the rationals
// WHY: Modular inverse logic downstream needs exact values, so no floating point is involved
// SOURCE: https://en.wikipedia.org/wiki/Bareiss_algorithm
// FORMAT THEOREM: ∀M ∈ ℤ^{n×n}: rank(M) + nullity(M) = n
// PURITY: CORE
// INVARIANT: Inputs are never mutated; elimination works on local bigint copies
// COMPLEXITY: O(1) for n <= 3, O(n³) bigint operations otherwise

import type { Matrix } from "../types/index.js";

type BigRows = ReadonlyArray<ReadonlyArray<bigint>>;

const toBig = (matrix: Matrix): BigRows =>
	matrix.map((row) => row.map((entry) => BigInt(entry)));

const abs = (x: bigint): bigint => (x < 0n ? -x : x);

const cell = (rows: BigRows, i: number, j: number): bigint =>
	rows[i]?.[j] ?? 0n;

const swapRows = (rows: BigRows, a: number, b: number): BigRows =>
	a === b
		? rows
		: rows.map((row, i) => {
				if (i === a) return rows[b] ?? row;
				if (i === b) return rows[a] ?? row;
				return row;
			});

/**
 * Submatrix with row `i` and column `j` removed.
 *
 * @pure true
 * @precondition n >= 2
 */
export const minor = (matrix: Matrix, i: number, j: number): Matrix =>
	matrix
		.filter((_, r) => r !== i)
		.map((row) => row.filter((_, c) => c !== j));

/**
 * Fraction-free Gaussian elimination (Bareiss). Every division is exact.
 *
 * @pure true
 * @complexity O(n³)
 */
function bareissDeterminant(matrix: Matrix): bigint {
	const n = matrix.length;
	let rows = toBig(matrix);
	let sign = 1n;
	let previous = 1n;

	for (let k = 0; k < n - 1; k++) {
		if (cell(rows, k, k) === 0n) {
			const swapWith = rows.findIndex((row, i) => i > k && row[k] !== 0n);
			if (swapWith === -1) return 0n;
			rows = swapRows(rows, k, swapWith);
			sign = -sign;
		}
		const pivotRow = rows[k] ?? [];
		const pivot = cell(rows, k, k);
		const divisor = previous;
		rows = rows.map((row, i) =>
			i <= k
				? row
				: row.map((x, j) =>
						j <= k
							? 0n
							: (x * pivot - (row[k] ?? 0n) * (pivotRow[j] ?? 0n)) / divisor,
					),
		);
		previous = pivot;
	}
	return sign * cell(rows, n - 1, n - 1);
}

/**
 * Exact integer determinant.
 *
 * Uses the closed forms for n ≤ 3 (3×3: the six-term expansion) and
 * Bareiss elimination beyond that.
 *
 * @pure true
 * @precondition matrix is square with safe-integer entries (validateKey)
 * @postcondition result is exact for every size of entry
 *
 * @example
 * ```ts
 * determinant([[1, 2], [3, 4]]); // -2n
 * determinant([[2, 1, 1], [1, 2, 0], [0, 1, 2]]); // 7n
 * ```
 */
export function determinant(matrix: Matrix): bigint {
	const m = toBig(matrix);
	const at = (i: number, j: number): bigint => cell(m, i, j);
	switch (matrix.length) {
		case 0:
			return 1n;
		case 1:
			return at(0, 0);
		case 2:
			return at(0, 0) * at(1, 1) - at(0, 1) * at(1, 0);
		case 3:
			return (
				at(0, 0) * at(1, 1) * at(2, 2) +
				at(0, 1) * at(1, 2) * at(2, 0) +
				at(0, 2) * at(1, 0) * at(2, 1) -
				at(0, 2) * at(1, 1) * at(2, 0) -
				at(0, 0) * at(1, 2) * at(2, 1) -
				at(0, 1) * at(1, 0) * at(2, 2)
			);
		default:
			return bareissDeterminant(matrix);
	}
}

/**
 * Rank over the rationals.
 *
 * Gaussian elimination that takes, in each column, the remaining row whose
 * entry has the largest absolute value as pivot. Row updates are
 * cross-multiplied instead of divided, so the computation stays exact.
 *
 * @pure true
 * @postcondition 0 <= result <= min(rows, columns)
 * @complexity O(n³)
 */
export function rank(matrix: Matrix): number {
	let rows = toBig(matrix);
	const columns = matrix[0]?.length ?? 0;
	let r = 0;

	for (let col = 0; col < columns && r < rows.length; col++) {
		let best = r;
		for (let i = r + 1; i < rows.length; i++) {
			if (abs(cell(rows, i, col)) > abs(cell(rows, best, col))) best = i;
		}
		if (cell(rows, best, col) === 0n) continue;

		rows = swapRows(rows, r, best);
		const pivotRow = rows[r] ?? [];
		const pivot = cell(rows, r, col);
		const pivotIndex = r;
		rows = rows.map((row, i) =>
			i <= pivotIndex
				? row
				: row.map((x, j) => x * pivot - (row[col] ?? 0n) * (pivotRow[j] ?? 0n)),
		);
		r++;
	}
	return r;
}

/**
 * Dimension of the null space: n − rank(M).
 *
 * @pure true
 * @invariant rank(M) + nullity(M) === M.length
 */
export const nullity = (matrix: Matrix): number =>
	matrix.length - rank(matrix);

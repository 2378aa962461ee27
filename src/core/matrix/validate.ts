// CHANGE: Shape validation for key matrices
// PURITY: CORE
// INVARIANT: Right(M) ⇒ M is non-empty, square, safe-integer, and of the required size when one is given
// COMPLEXITY: O(n²)

import { Either } from "effect";

import { DimensionMismatchError } from "../errors.js";
import type { Matrix } from "../types/index.js";

/**
 * Checks that `matrix` can serve as a cipher key.
 *
 * @param matrix Candidate key, row-major
 * @param dimension Required size n, or null to accept any n×n
 * @returns The same matrix, or DimensionMismatchError describing the first violation
 *
 * @pure true
 *
 * @example
 * ```ts
 * validateKey([[1, 2, 3], [4, 5, 6]], null);
 * // Left(DimensionMismatchError { rows: 2, columns: 3, ... })
 * ```
 */
export function validateKey(
	matrix: Matrix,
	dimension: number | null,
): Either.Either<Matrix, DimensionMismatchError> {
	const rows = matrix.length;
	const columns = matrix[0]?.length ?? 0;
	const mismatch = (detail: string): Either.Either<Matrix, DimensionMismatchError> =>
		Either.left(
			new DimensionMismatchError({ expected: dimension, rows, columns, detail }),
		);

	if (rows === 0) return mismatch("key matrix is empty");

	const ragged = matrix.findIndex((row) => row.length !== columns);
	if (ragged !== -1) {
		return mismatch(
			`row ${ragged + 1} has ${matrix[ragged]?.length ?? 0} entries, expected ${columns}`,
		);
	}
	if (rows !== columns) {
		return mismatch(`key matrix is ${rows}×${columns}, not square`);
	}
	if (dimension !== null && rows !== dimension) {
		return mismatch(
			`key matrix is ${rows}×${columns}, configured size is ${dimension}×${dimension}`,
		);
	}
	if (!matrix.every((row) => row.every((entry) => Number.isSafeInteger(entry)))) {
		return mismatch("key matrix entries must be integers");
	}
	return Either.right(matrix);
}

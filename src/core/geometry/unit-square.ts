// CHANGE: Image of the unit square under a 2×2 key, as plain data for a front end to draw
// FORMAT THEOREM: signedArea(M · square) = det(M); det(M) = 0 ⇔ the square collapses
// PURITY: CORE
// INVARIANT: Only 2×2 keys are accepted
// COMPLEXITY: O(1)

import { Either, pipe } from "effect";

import type { DimensionMismatchError } from "../errors.js";
import { determinant } from "../matrix/determinant.js";
import { validateKey } from "../matrix/validate.js";
import type { Matrix, Point, UnitSquareImage } from "../types/index.js";

export const UNIT_SQUARE: ReadonlyArray<Point> = [
	{ x: 0, y: 0 },
	{ x: 1, y: 0 },
	{ x: 1, y: 1 },
	{ x: 0, y: 1 },
];

const apply = (matrix: Matrix, p: Point): Point => ({
	x: (matrix[0]?.[0] ?? 0) * p.x + (matrix[0]?.[1] ?? 0) * p.y,
	y: (matrix[1]?.[0] ?? 0) * p.x + (matrix[1]?.[1] ?? 0) * p.y,
});

/**
 * Where the unit square lands under a 2×2 key.
 *
 * A singular key flattens the square onto a line, or onto the origin for the
 * zero matrix.
 *
 * @pure true
 *
 * @example
 * ```ts
 * transformUnitSquare([[1, 2], [2, 4]]);
 * // Right({ signedArea: 0n, collapse: "line", transformed: [{0,0},{1,2},{3,6},{2,4}] })
 * ```
 */
export const transformUnitSquare = (
	key: Matrix,
): Either.Either<UnitSquareImage, DimensionMismatchError> =>
	pipe(
		validateKey(key, 2),
		Either.map((matrix) => {
			const transformed = UNIT_SQUARE.map((p) => apply(matrix, p));
			const signedArea = determinant(matrix);
			const atOrigin = transformed.every((p) => p.x === 0 && p.y === 0);
			const collapse: UnitSquareImage["collapse"] =
				signedArea !== 0n ? "none" : atOrigin ? "point" : "line";
			return { original: UNIT_SQUARE, transformed, signedArea, collapse };
		}),
	);

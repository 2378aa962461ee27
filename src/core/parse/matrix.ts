// CHANGE: Parse matrices typed by the user ("2,1,1; 1,2,0; 0,1,2")
// WHY: Unreadable input is reported instead of being replaced by a default key
// PURITY: CORE
// INVARIANT: Right(M) ⇒ every entry is a safe integer; shape is checked later by validateKey
// COMPLEXITY: O(|input|)

import { Either } from "effect";

import { MatrixParseError } from "../errors.js";
import type { Matrix } from "../types/index.js";

const INTEGER = /^[+-]?\d+$/u;

/**
 * Rows are separated by `;`, `|` or newlines; entries by commas and/or whitespace.
 * Surrounding brackets are ignored, so "[[1,2],[3,4]]" reads too.
 *
 * @pure true
 *
 * @example
 * ```ts
 * parseMatrix("1 2; 3 4");       // Right([[1, 2], [3, 4]])
 * parseMatrix("[[1,2],[3,4]]");  // Right([[1, 2], [3, 4]])
 * parseMatrix("1,x;3,4");        // Left(MatrixParseError: "x" is not an integer)
 * ```
 */
export function parseMatrix(input: string): Either.Either<Matrix, MatrixParseError> {
	const fail = (detail: string): Either.Either<Matrix, MatrixParseError> =>
		Either.left(new MatrixParseError({ input, detail }));

	const rowTexts = input
		.replace(/\]\s*,\s*\[/gu, ";")
		.replace(/[\[\]]/gu, "")
		.split(/[;|\n]/u)
		.map((row) => row.trim())
		.filter((row) => row.length > 0);

	if (rowTexts.length === 0) return fail("matrix is empty");

	const rows: number[][] = [];
	for (const rowText of rowTexts) {
		const cells = rowText.split(/[\s,]+/u).filter((cell) => cell.length > 0);
		const bad = cells.find((cell) => !INTEGER.test(cell));
		if (bad !== undefined) return fail(`${JSON.stringify(bad)} is not an integer`);
		const row = cells.map((cell) => Number.parseInt(cell, 10));
		if (!row.every((value) => Number.isSafeInteger(value))) {
			return fail(`row "${rowText}" holds a value outside the safe integer range`);
		}
		rows.push(row);
	}
	return Either.right(rows);
}

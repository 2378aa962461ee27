// CHANGE: Matrix text parsing
// INVARIANT: Right(M) ⇒ every entry is a safe integer

import { describe, expect, it } from "vitest";

import { parseMatrix } from "../../../src/core/parse/matrix.js";
import { leftOf, rightOf } from "../../utils/builders.js";

const SQUARE = [
	[1, 2],
	[3, 4],
];

describe("parseMatrix", () => {
	it.each(["1 2; 3 4", "1,2;3,4", "[[1,2],[3,4]]", "[[1, 2], [3, 4]]", "1,2|3,4", "1 2\n3 4"])(
		"reads %j",
		(input) => {
			expect(rightOf(parseMatrix(input))).toEqual(SQUARE);
		},
	);

	it("reads signs", () => {
		expect(rightOf(parseMatrix("-1, +2; 3 4"))).toEqual([
			[-1, 2],
			[3, 4],
		]);
	});

	it("leaves ragged rows for validateKey", () => {
		expect(rightOf(parseMatrix("1,2;3"))).toEqual([[1, 2], [3]]);
	});

	it("rejects empty input", () => {
		expect(leftOf(parseMatrix("")).detail).toBe("matrix is empty");
		expect(leftOf(parseMatrix("[ ]")).detail).toBe("matrix is empty");
	});

	it("names the first cell that is not an integer", () => {
		const error = leftOf(parseMatrix("1,x;3,4"));
		expect(error._tag).toBe("MatrixParse");
		expect(error.input).toBe("1,x;3,4");
		expect(error.detail).toBe('"x" is not an integer');
		expect(leftOf(parseMatrix("1.5,2")).detail).toBe('"1.5" is not an integer');
	});

	it("rejects values outside the safe integer range", () => {
		expect(leftOf(parseMatrix("99999999999999999999")).detail).toBe(
			'row "99999999999999999999" holds a value outside the safe integer range',
		);
	});
});

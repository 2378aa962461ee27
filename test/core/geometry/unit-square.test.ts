// CHANGE: Image of the unit square under a 2×2 key
// FORMAT THEOREM: signedArea = det(M); det(M) = 0 ⇔ collapse ≠ "none"

import { describe, expect, it } from "vitest";

import { transformUnitSquare } from "../../../src/core/geometry/unit-square.js";
import { presets } from "../../../src/core/presets.js";
import { leftOf, rightOf } from "../../utils/builders.js";

describe("transformUnitSquare", () => {
	it("flattens the square onto a line for a singular key", () => {
		const image = rightOf(transformUnitSquare(presets.singular.matrix));
		expect(image.transformed).toEqual([
			{ x: 0, y: 0 },
			{ x: 1, y: 2 },
			{ x: 3, y: 6 },
			{ x: 2, y: 4 },
		]);
		expect(image.signedArea).toBe(0n);
		expect(image.collapse).toBe("line");
	});

	it("collapses onto the origin for the zero matrix", () => {
		const image = rightOf(
			transformUnitSquare([
				[0, 0],
				[0, 0],
			]),
		);
		expect(image.collapse).toBe("point");
	});

	it("keeps the square two-dimensional for an invertible key", () => {
		const image = rightOf(
			transformUnitSquare([
				[2, 0],
				[0, 3],
			]),
		);
		expect(image.signedArea).toBe(6n);
		expect(image.collapse).toBe("none");
		expect(image.transformed).toEqual([
			{ x: 0, y: 0 },
			{ x: 2, y: 0 },
			{ x: 2, y: 3 },
			{ x: 0, y: 3 },
		]);
	});

	it("accepts only 2×2 keys", () => {
		expect(leftOf(transformUnitSquare(presets.good.matrix)).detail).toBe(
			"key matrix is 3×3, configured size is 2×2",
		);
	});
});

// CHANGE: Tests for exact determinant, rank and nullity
// FORMAT THEOREM: ∀M ∈ ℤ^{n×n}: rank(M) + nullity(M) = n ∧ (det(M) ≠ 0 ⇔ rank(M) = n)
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	determinant,
	minor,
	nullity,
	rank,
} from "../../../src/core/matrix/determinant.js";
import type { Matrix } from "../../../src/core/types/index.js";
import { anySquareMatrix, identity, squareMatrix } from "../../utils/builders.js";

const laplace = (matrix: Matrix): bigint =>
	(matrix[0] ?? []).reduce(
		(acc, entry, j) =>
			acc + (j % 2 === 0 ? 1n : -1n) * BigInt(entry) * determinant(minor(matrix, 0, j)),
		0n,
	);

describe("determinant", () => {
	it("uses the closed forms for small keys", () => {
		expect(determinant([])).toBe(1n);
		expect(determinant([[5]])).toBe(5n);
		expect(
			determinant([
				[1, 2],
				[3, 4],
			]),
		).toBe(-2n);
		expect(
			determinant([
				[2, 1, 1],
				[1, 2, 0],
				[0, 1, 2],
			]),
		).toBe(7n);
		expect(
			determinant([
				[1, 2, 3],
				[2, 4, 6],
				[0, 1, 2],
			]),
		).toBe(0n);
	});

	it("eliminates 4×4 keys exactly", () => {
		expect(determinant(identity(4))).toBe(1n);
		expect(
			determinant([
				[2, 0, 0, 0],
				[0, 3, 0, 0],
				[0, 0, 4, 0],
				[0, 0, 0, 5],
			]),
		).toBe(120n);
	});

	it("flips the sign when a row swap is needed", () => {
		expect(
			determinant([
				[0, 1, 0, 0],
				[1, 0, 0, 0],
				[0, 0, 1, 0],
				[0, 0, 0, 1],
			]),
		).toBe(-1n);
	});

	it("returns 0 when a column has no pivot", () => {
		expect(
			determinant([
				[0, 1, 2, 3],
				[0, 4, 5, 6],
				[0, 7, 8, 9],
				[0, 1, 1, 1],
			]),
		).toBe(0n);
	});

	it("stays exact beyond Number.MAX_SAFE_INTEGER", () => {
		expect(
			determinant([
				[100000001, 0],
				[0, 100000003],
			]),
		).toBe(10000000400000003n);
		expect(
			determinant([
				[2 ** 52, 1, 0, 0],
				[0, 2 ** 52, 0, 0],
				[0, 0, 3, 0],
				[0, 0, 0, 1],
			]),
		).toBe(3n * 2n ** 104n);
	});

	it("agrees with cofactor expansion for 4×4 and 5×5 keys", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 4, max: 5 }).chain((n) => squareMatrix(n, -9, 9)),
				(matrix) => determinant(matrix) === laplace(matrix),
			),
		);
	});
});

describe("rank and nullity", () => {
	it("reports the rank of proportional rows", () => {
		const singular = [
			[1, 2],
			[2, 4],
		];
		expect(rank(singular)).toBe(1);
		expect(nullity(singular)).toBe(1);
	});

	it("reports rank 2 and nullity 1 for the singular 3×3 key", () => {
		const bad = [
			[1, 2, 3],
			[2, 4, 6],
			[0, 1, 2],
		];
		expect(rank(bad)).toBe(2);
		expect(nullity(bad)).toBe(1);
	});

	it("handles the zero matrix and the identity", () => {
		expect(
			rank([
				[0, 0],
				[0, 0],
			]),
		).toBe(0);
		expect(
			nullity([
				[0, 0],
				[0, 0],
			]),
		).toBe(2);
		expect(rank(identity(3))).toBe(3);
		expect(
			rank([
				[1, 2],
				[3, 4],
			]),
		).toBe(2);
	});

	it("rank + nullity = n", () => {
		fc.assert(
			fc.property(anySquareMatrix(5, -5, 5), (matrix) => {
				return rank(matrix) + nullity(matrix) === matrix.length;
			}),
		);
	});

	it("has full rank exactly when the determinant is non-zero", () => {
		fc.assert(
			fc.property(anySquareMatrix(4, -2, 2), (matrix) => {
				return (determinant(matrix) !== 0n) === (rank(matrix) === matrix.length);
			}),
		);
	});
});

// CHANGE: Unit and property tests for modular arithmetic primitives
// FORMAT THEOREM: ∀a,b ≥ 0: a·x + b·y = gcd(a,b) where {x,y} = extendedGcd(a,b)
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	extendedGcd,
	gcd,
	mod,
	modBig,
	multiplyVectorMod,
	primeFactors,
	reduceMatrix,
} from "../../../src/core/matrix/arithmetic.js";

describe("mod", () => {
	it("returns the least non-negative residue for negative inputs", () => {
		expect(mod(-2, 26)).toBe(24);
		expect(mod(27, 26)).toBe(1);
		expect(mod(0, 5)).toBe(0);
	});

	it("always lands in [0, m)", () => {
		fc.assert(
			fc.property(fc.integer(), fc.integer({ min: 1, max: 1000 }), (a, m) => {
				const r = mod(a, m);
				return r >= 0 && r < m && (a - r) % m === 0;
			}),
		);
	});
});

describe("modBig", () => {
	it("reduces exact values beyond the safe-integer range", () => {
		expect(modBig(10000000400000003n, 26)).toBe(3);
		expect(modBig(-10000000400000003n, 26)).toBe(23);
		expect(modBig(-2n, 26)).toBe(24);
	});

	it("agrees with mod on safe integers", () => {
		fc.assert(
			fc.property(fc.maxSafeInteger(), fc.integer({ min: 1, max: 100 }), (a, m) => {
				return modBig(BigInt(a), m) === mod(a, m);
			}),
		);
	});
});

describe("gcd", () => {
	it("handles zero and signs", () => {
		expect(gcd(24, 26)).toBe(2);
		expect(gcd(0, 26)).toBe(26);
		expect(gcd(-9, 26)).toBe(1);
	});
});

describe("extendedGcd", () => {
	it("finds the Bézout pair for 9 and 26", () => {
		expect(extendedGcd(9, 26)).toEqual({ gcd: 1, x: 3, y: -1 });
	});

	it("satisfies a·x + b·y = gcd(a, b)", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: 0, max: 10_000 }),
				fc.integer({ min: 0, max: 10_000 }),
				(a, b) => {
					const { gcd: g, x, y } = extendedGcd(a, b);
					return a * x + b * y === g && g === gcd(a, b);
				},
			),
		);
	});
});

describe("primeFactors", () => {
	it("lists distinct primes in ascending order", () => {
		expect(primeFactors(26)).toEqual([2, 13]);
		expect(primeFactors(27)).toEqual([3]);
		expect(primeFactors(360)).toEqual([2, 3, 5]);
		expect(primeFactors(29)).toEqual([29]);
		expect(primeFactors(1)).toEqual([]);
	});
});

describe("multiplyVectorMod", () => {
	it("multiplies a block by the key modulo m", () => {
		expect(
			multiplyVectorMod(
				[
					[3, 3],
					[2, 5],
				],
				[7, 8],
				26,
			),
		).toEqual([19, 2]);
	});

	it("reduces negative entries before multiplying", () => {
		expect(multiplyVectorMod([[-1]], [3], 26)).toEqual([23]);
	});
});

describe("reduceMatrix", () => {
	it("maps every entry into [0, m)", () => {
		expect(reduceMatrix([[-1, 27]], 26)).toEqual([[25, 1]]);
	});
});

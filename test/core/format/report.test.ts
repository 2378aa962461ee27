// CHANGE: Terminal rendering of engine results
// INVARIANT: Formatting is pure; each test asserts the exact lines

import { Option } from "effect";
import { describe, expect, it } from "vitest";

import { encrypt } from "../../../src/core/cipher/hill.js";
import { STANDARD_CONFIG } from "../../../src/core/config.js";
import {
	ConfigError,
	DimensionMismatchError,
	InvalidSymbolError,
	MatrixParseError,
	NotInvertibleError,
	UsageError,
} from "../../../src/core/errors.js";
import { findCollision } from "../../../src/core/explain/collision.js";
import { diagnose } from "../../../src/core/explain/report.js";
import {
	describeError,
	formatCollision,
	formatEncryption,
	formatLesson,
	formatMatrix,
	formatPresets,
	formatReport,
	formatUnitSquare,
} from "../../../src/core/format/report.js";
import { transformUnitSquare } from "../../../src/core/geometry/unit-square.js";
import { presets } from "../../../src/core/presets.js";
import { rightOf } from "../../utils/builders.js";

describe("formatMatrix", () => {
	it("right-aligns columns", () => {
		expect(
			formatMatrix([
				[1, -2],
				[30, 4],
			]),
		).toEqual(["[  1 -2 ]", "[ 30  4 ]"]);
	});
});

describe("formatReport", () => {
	it("renders every fact and the rationale", () => {
		expect(formatReport(diagnose(presets["shares-factor"].matrix, 26))).toEqual([
			"Key matrix (2×2):",
			"  [ 1 2 ]",
			"  [ 3 4 ]",
			"Determinant: -2",
			"Determinant mod 26: 24",
			"gcd(24, 26): 2",
			"Rank: 2",
			"Nullity: 0",
			"Singular: no",
			"Invertible mod 26: no",
			"❌ non-singular, but not invertible modulo 26",
			"Why:",
			"  - det(M) = -2; det mod 26 = 24; gcd(24, 26) = 2.",
			"  - rank = 2, nullity = 0 (rank + nullity = 2).",
			"  - det ≠ 0, so the key is invertible over the reals, but det mod 26 shares the factor 2 with 26.",
			"  - det has no inverse modulo 26, so no inverse key exists: distinct plaintext blocks collide modulo 26 even though nullity is 0.",
		]);
	});

	it("adds the inverse key when one exists", () => {
		const lines = formatReport(diagnose(presets.classic.matrix, 26));
		const at = lines.indexOf("Inverse key mod 26:");
		expect(lines[at - 1]).toBe("✅ valid key: invertible modulo 26");
		expect(lines.slice(at + 1, at + 3)).toEqual(["  [ 15 17 ]", "  [ 20  9 ]"]);
	});

	it("labels a singular key", () => {
		expect(formatReport(diagnose(presets.singular.matrix, 26))).toContain(
			"❌ singular key: not invertible over the reals or modulo any m",
		);
	});
});

describe("formatEncryption", () => {
	it("shows each step and the decrypted message", () => {
		const result = rightOf(encrypt("HI", presets.classic.matrix, STANDARD_CONFIG));
		expect(formatEncryption(result)).toEqual([
			'Message: "HI"',
			'Padded: "HI"',
			"Symbols: [7, 8]",
			"Cipher blocks: [19, 2]",
			'Cipher text: "TC"',
			'Decrypted: "HI"',
		]);
	});

	it("reports a refused decryption", () => {
		const result = rightOf(encrypt("AB", presets.singular.matrix, STANDARD_CONFIG));
		expect(formatEncryption(result).at(-1)).toBe(
			"DECRYPTION FAILED: key matrix is singular (det = 0), so it has no inverse modulo 26",
		);
	});
});

describe("formatCollision", () => {
	it("explains the absence of a collision", () => {
		expect(formatCollision(Option.none(), 26)).toEqual([
			"No collision found: the key is injective modulo 26 or the search space is too large.",
		]);
	});

	it("shows the colliding pair", () => {
		const collision = rightOf(findCollision(presets.singular.matrix, STANDARD_CONFIG));
		expect(formatCollision(collision, 26)).toEqual([
			"Kernel vector k: [24, 1] (M·k ≡ 0 mod 26)",
			'"AA" [0, 0] and "YB" [24, 1]',
			"both encrypt to [0, 0]",
		]);
	});
});

describe("formatUnitSquare", () => {
	it("lists corners and the collapse", () => {
		const image = rightOf(transformUnitSquare(presets.singular.matrix));
		expect(formatUnitSquare(image)).toEqual([
			"Unit square: (0, 0) (1, 0) (1, 1) (0, 1)",
			"Transformed: (0, 0) (1, 2) (3, 6) (2, 4)",
			"Signed area: 0",
			"The square collapses onto a line.",
		]);
	});
});

describe("formatLesson and formatPresets", () => {
	it("numbers lesson sections", () => {
		expect(formatLesson([{ title: "Geometry", lines: ["a", "b"] }])).toEqual([
			"1. GEOMETRY",
			"   - a",
			"   - b",
		]);
	});

	it("lists a preset with its matrix", () => {
		expect(formatPresets([["classic", presets.classic]])).toEqual([
			"classic: Textbook 2×2 key",
			"  det = 9, gcd(9, 26) = 1.",
			"    [ 3 3 ]",
			"    [ 2 5 ]",
		]);
	});
});

describe("describeError", () => {
	it("describes every error kind on one line", () => {
		expect(describeError(new InvalidSymbolError({ symbol: "!", position: 2 }))).toBe(
			'invalid symbol "!" at position 2: not in the alphabet',
		);
		expect(
			describeError(
				new DimensionMismatchError({
					expected: 2,
					rows: 3,
					columns: 3,
					detail: "key matrix is 3×3, configured size is 2×2",
				}),
			),
		).toBe("dimension mismatch: key matrix is 3×3, configured size is 2×2");
		expect(
			describeError(
				new NotInvertibleError({
					scope: "matrix",
					value: 0,
					modulus: 26,
					gcd: 26,
					detail: "key matrix is singular (det = 0), so it has no inverse modulo 26",
				}),
			),
		).toBe(
			"decryption impossible: key matrix is singular (det = 0), so it has no inverse modulo 26",
		);
		expect(
			describeError(
				new MatrixParseError({ input: "1,x", detail: '"x" is not an integer' }),
			),
		).toBe('cannot read matrix "1,x": "x" is not an integer');
		expect(describeError(new ConfigError({ detail: "bad" }))).toBe(
			"configuration error: bad",
		);
		expect(
			describeError(new ConfigError({ detail: "bad", path: "/tmp/hill.config.json" })),
		).toBe("configuration error in /tmp/hill.config.json: bad");
		expect(describeError(new UsageError({ detail: "unknown option --x" }))).toBe(
			"usage error: unknown option --x",
		);
	});
});

// CHANGE: Pure text rendering of engine results for the terminal front end
// WHY: SHELL only prints lines; building them stays deterministic and testable
// PURITY: CORE
// INVARIANT: No side effects; deterministic mapping from inputs to lines
// COMPLEXITY: O(size of the rendered value)

import { Option } from "effect";
import { match } from "ts-pattern";

import type { AppError } from "../errors.js";
import type { LessonSection } from "../explain/lesson.js";
import type { Preset } from "../presets.js";
import type {
	Collision,
	DiagnosticReport,
	EncryptionResult,
	Matrix,
	UnitSquareImage,
	Vector,
} from "../types/index.js";

const yesNo = (flag: boolean): string => (flag ? "yes" : "no");

const indent = (lines: ReadonlyArray<string>): ReadonlyArray<string> =>
	lines.map((line) => `  ${line}`);

const formatVector = (vector: Vector): string => `[${vector.join(", ")}]`;

/**
 * Matrix rows with right-aligned columns.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatMatrix([[1, -2], [30, 4]]);
 * // ["[  1 -2 ]", "[ 30  4 ]"]
 * ```
 */
export function formatMatrix(matrix: Matrix): ReadonlyArray<string> {
	const width = Math.max(
		1,
		...matrix.flatMap((row) => row.map((entry) => String(entry).length)),
	);
	return matrix.map(
		(row) => `[ ${row.map((entry) => String(entry).padStart(width)).join(" ")} ]`,
	);
}

const verdictLabel = (report: DiagnosticReport): string =>
	match(report.verdict)
		.with("invertible", () => `✅ valid key: invertible modulo ${report.modulus}`)
		.with("singular", () => "❌ singular key: not invertible over the reals or modulo any m")
		.with(
			"shares-factor",
			() => `❌ non-singular, but not invertible modulo ${report.modulus}`,
		)
		.exhaustive();

/**
 * @pure true
 */
export function formatReport(report: DiagnosticReport): ReadonlyArray<string> {
	const m = report.modulus;
	return [
		`Key matrix (${report.dimension}×${report.dimension}):`,
		...indent(formatMatrix(report.matrix)),
		`Determinant: ${report.determinant}`,
		`Determinant mod ${m}: ${report.determinantMod}`,
		`gcd(${report.determinantMod}, ${m}): ${report.gcd}`,
		`Rank: ${report.rank}`,
		`Nullity: ${report.nullity}`,
		`Singular: ${yesNo(report.singular)}`,
		`Invertible mod ${m}: ${yesNo(report.keyValid)}`,
		verdictLabel(report),
		...(report.inverse === null
			? []
			: [`Inverse key mod ${m}:`, ...indent(formatMatrix(report.inverse))]),
		"Why:",
		...report.rationale.map((line) => `  - ${line}`),
	];
}

/**
 * @pure true
 */
export function formatEncryption(result: EncryptionResult): ReadonlyArray<string> {
	const { encoded, decryption } = result;
	const outcome =
		decryption._tag === "Decrypted"
			? [`Decrypted: "${decryption.message}"`]
			: [`DECRYPTION FAILED: ${decryption.error.detail}`];
	return [
		`Message: "${encoded.original}"`,
		`Padded: "${encoded.padded}"`,
		`Symbols: ${formatVector(encoded.symbols)}`,
		`Cipher blocks: ${encoded.blocks.map(formatVector).join(" ")}`,
		`Cipher text: "${encoded.cipherText}"`,
		...outcome,
	];
}

/**
 * @pure true
 */
export const formatCollision = (
	collision: Option.Option<Collision>,
	modulus: number,
): ReadonlyArray<string> =>
	Option.match(collision, {
		onNone: () => [
			`No collision found: the key is injective modulo ${modulus} or the search space is too large.`,
		],
		onSome: (c) => [
			`Kernel vector k: ${formatVector(c.kernel)} (M·k ≡ 0 mod ${modulus})`,
			`"${c.firstText}" ${formatVector(c.first)} and "${c.secondText}" ${formatVector(c.second)}`,
			`both encrypt to ${formatVector(c.cipherBlock)}`,
		],
	});

/**
 * @pure true
 */
export function formatUnitSquare(image: UnitSquareImage): ReadonlyArray<string> {
	const points = (ps: UnitSquareImage["original"]): string =>
		ps.map((p) => `(${p.x}, ${p.y})`).join(" ");
	return [
		`Unit square: ${points(image.original)}`,
		`Transformed: ${points(image.transformed)}`,
		`Signed area: ${image.signedArea}`,
		match(image.collapse)
			.with("none", () => "The square stays two-dimensional.")
			.with("line", () => "The square collapses onto a line.")
			.with("point", () => "The square collapses onto the origin.")
			.exhaustive(),
	];
}

/**
 * @pure true
 */
export const formatLesson = (
	sections: ReadonlyArray<LessonSection>,
): ReadonlyArray<string> =>
	sections.flatMap((section, i) => [
		`${i + 1}. ${section.title.toUpperCase()}`,
		...section.lines.map((line) => `   - ${line}`),
	]);

/**
 * @pure true
 */
export const formatPresets = (
	entries: ReadonlyArray<readonly [string, Preset]>,
): ReadonlyArray<string> =>
	entries.flatMap(([name, preset]) => [
		`${name}: ${preset.label}`,
		`  ${preset.description}`,
		...indent(indent(formatMatrix(preset.matrix))),
	]);

/**
 * One-line description of any application error, printed verbatim.
 *
 * @pure true
 */
export const describeError = (error: AppError): string =>
	match(error)
		.with(
			{ _tag: "InvalidSymbol" },
			(e) =>
				`invalid symbol ${JSON.stringify(e.symbol)} at position ${e.position}: not in the alphabet`,
		)
		.with({ _tag: "DimensionMismatch" }, (e) => `dimension mismatch: ${e.detail}`)
		.with({ _tag: "NotInvertible" }, (e) => `decryption impossible: ${e.detail}`)
		.with(
			{ _tag: "MatrixParse" },
			(e) => `cannot read matrix ${JSON.stringify(e.input)}: ${e.detail}`,
		)
		.with(
			{ _tag: "Config" },
			(e) =>
				`configuration error${e.path === undefined ? "" : ` in ${e.path}`}: ${e.detail}`,
		)
		.with({ _tag: "Usage" }, (e) => `usage error: ${e.detail}`)
		.exhaustive();

// CHANGE: Named demonstration keys
// PURITY: CORE
// INVARIANT: Every preset matrix is square with integer entries

import { Option } from "effect";

import type { Matrix } from "./types/index.js";

export interface Preset {
	readonly label: string;
	readonly description: string;
	readonly matrix: Matrix;
}

export const presets = {
	good: {
		label: "Invertible 3×3",
		description: "det = 7, coprime with 26: encrypts and decrypts.",
		matrix: [
			[2, 1, 1],
			[1, 2, 0],
			[0, 1, 2],
		],
	},
	bad: {
		label: "Singular 3×3",
		description: "Second row is twice the first: det = 0, rank 2, nullity 1.",
		matrix: [
			[1, 2, 3],
			[2, 4, 6],
			[0, 1, 2],
		],
	},
	"shares-factor": {
		label: "Non-singular but not invertible mod 26",
		description: "det = -2 ≡ 24 (mod 26) and gcd(24, 26) = 2.",
		matrix: [
			[1, 2],
			[3, 4],
		],
	},
	classic: {
		label: "Textbook 2×2 key",
		description: "det = 9, gcd(9, 26) = 1.",
		matrix: [
			[3, 3],
			[2, 5],
		],
	},
	singular: {
		label: "Singular 2×2",
		description: "Rows are proportional: det = 0, rank 1, nullity 1.",
		matrix: [
			[1, 2],
			[2, 4],
		],
	},
} as const satisfies Record<string, Preset>;

export type PresetName = keyof typeof presets;

const isPresetName = (name: string): name is PresetName =>
	Object.prototype.hasOwnProperty.call(presets, name);

/**
 * Looks a preset up by name.
 *
 * @pure true
 */
export const findPreset = (name: string): Option.Option<Preset> =>
	isPresetName(name) ? Option.some(presets[name]) : Option.none();

// CHANGE: Built-in cipher configurations and the validating constructor
// PURITY: CORE
// INVARIANT: Every CipherConfig leaving this module satisfies alphabet.length === modulus
// COMPLEXITY: O(|alphabet|)

import { Either } from "effect";

import { ConfigError } from "./errors.js";
import type {
	CipherConfig,
	CipherConfigInput,
	ConfigBase,
} from "./types/index.js";

const LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

/**
 * Classic Hill cipher over Z_26: A=0 … Z=25, final block padded with "A".
 */
export const STANDARD_CONFIG: CipherConfig = {
	modulus: 26,
	alphabet: LETTERS,
	padSymbol: "A",
	symbolPolicy: "strict",
	dimension: null,
};

/**
 * Letters plus space over Z_27: space=0, A=1 … Z=26, space padding.
 */
export const SPACED_CONFIG: CipherConfig = {
	modulus: 27,
	alphabet: ` ${LETTERS}`,
	padSymbol: " ",
	symbolPolicy: "strict",
	dimension: null,
};

export const CONFIG_BASES: Readonly<Record<ConfigBase, CipherConfig>> = {
	standard: STANDARD_CONFIG,
	spaced: SPACED_CONFIG,
};

const fail = (detail: string): Either.Either<CipherConfig, ConfigError> =>
	Either.left(new ConfigError({ detail }));

/**
 * Overlays `input` on `base` and checks the result.
 *
 * When only `modulus` changes and the base alphabet no longer fits, the
 * alphabet must be supplied too; nothing is guessed.
 *
 * @pure true
 * @postcondition Right(c) ⇒ c.alphabet.length === c.modulus ∧ c.alphabet.includes(c.padSymbol)
 *
 * @example
 * ```ts
 * makeCipherConfig({ padSymbol: "X" }); // Right({ ...STANDARD_CONFIG, padSymbol: "X" })
 * makeCipherConfig({ modulus: 27 });    // Left(ConfigError: alphabet has 26 symbols ...)
 * ```
 */
export function makeCipherConfig(
	input: CipherConfigInput,
	base: CipherConfig = STANDARD_CONFIG,
): Either.Either<CipherConfig, ConfigError> {
	const config: CipherConfig = {
		modulus: input.modulus ?? base.modulus,
		alphabet: input.alphabet ?? base.alphabet,
		padSymbol: input.padSymbol ?? base.padSymbol,
		symbolPolicy: input.symbolPolicy ?? base.symbolPolicy,
		dimension: input.dimension === undefined ? base.dimension : input.dimension,
	};
	const { modulus, alphabet, padSymbol, dimension } = config;

	if (!Number.isSafeInteger(modulus) || modulus < 2) {
		return fail(`modulus must be an integer >= 2, got ${modulus}`);
	}
	const symbols = Array.from(alphabet);
	if (symbols.length !== modulus) {
		return fail(
			`alphabet has ${symbols.length} symbols but modulus is ${modulus}; they must match`,
		);
	}
	if (new Set(symbols).size !== symbols.length) {
		return fail("alphabet contains a repeated symbol");
	}
	if (symbols.some((symbol) => symbol !== symbol.toUpperCase())) {
		return fail("alphabet symbols must be uppercase; messages are uppercased before encoding");
	}
	if (Array.from(padSymbol).length !== 1 || !symbols.includes(padSymbol)) {
		return fail(`pad symbol ${JSON.stringify(padSymbol)} is not in the alphabet`);
	}
	if (dimension !== null && (!Number.isSafeInteger(dimension) || dimension < 1)) {
		return fail(`dimension must be a positive integer, got ${dimension}`);
	}
	return Either.right(config);
}

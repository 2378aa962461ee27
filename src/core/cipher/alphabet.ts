// CHANGE: Symbol ↔ integer mapping for messages over the configured alphabet
// PURITY: CORE
// INVARIANT: symbolsToIndices and indicesToSymbols are mutually inverse on alphabet strings
// COMPLEXITY: O(|message| · |alphabet|)

import { Either } from "effect";

import { InvalidSymbolError } from "../errors.js";
import type { CipherConfig, Vector } from "../types/index.js";

/**
 * Message restricted to the alphabet.
 *
 * @property text Uppercased message with out-of-alphabet characters removed
 * @property spacePositions Where spaces were dropped, as indices into the text with its spaces put back
 */
export interface NormalizedMessage {
	readonly text: string;
	readonly spacePositions: ReadonlyArray<number>;
}

/**
 * Uppercases `message` and applies the configured symbol policy.
 *
 * @returns Normalized text, or InvalidSymbolError for the first offending
 *          character under the `strict` policy
 *
 * @pure true
 * @postcondition Right(r) ⇒ every character of r.text is in config.alphabet
 *
 * @example
 * ```ts
 * normalizeMessage("hi there", { ...STANDARD_CONFIG, symbolPolicy: "strip" });
 * // Right({ text: "HITHERE", spacePositions: [2] })
 * ```
 */
export function normalizeMessage(
	message: string,
	config: CipherConfig,
): Either.Either<NormalizedMessage, InvalidSymbolError> {
	const alphabet = Array.from(config.alphabet);
	const kept: string[] = [];
	const spacePositions: number[] = [];
	const characters = Array.from(message.toUpperCase());

	for (const [position, symbol] of characters.entries()) {
		if (alphabet.includes(symbol)) {
			kept.push(symbol);
		} else if (config.symbolPolicy === "strict") {
			return Either.left(new InvalidSymbolError({ symbol, position }));
		} else if (symbol === " ") {
			spacePositions.push(kept.length + spacePositions.length);
		}
	}
	return Either.right({ text: kept.join(""), spacePositions });
}

/**
 * Integer value of each symbol (its index in the alphabet).
 *
 * @pure true
 * @precondition every character of text is in config.alphabet
 */
export const symbolsToIndices = (text: string, config: CipherConfig): Vector => {
	const alphabet = Array.from(config.alphabet);
	return Array.from(text).map((symbol) => alphabet.indexOf(symbol));
};

/**
 * Symbol for each integer value; values are reduced mod the alphabet size.
 *
 * @pure true
 */
export const indicesToSymbols = (
	indices: Vector,
	config: CipherConfig,
): string => {
	const alphabet = Array.from(config.alphabet);
	return indices
		.map((index) => {
			const size = alphabet.length;
			return alphabet[((index % size) + size) % size] ?? "";
		})
		.join("");
};

/**
 * Puts back the spaces recorded by normalizeMessage.
 *
 * Positions past the end of `text` are appended in order.
 *
 * @pure true
 * @postcondition reinsertSpaces(normalize(s).text, normalize(s).spacePositions) === s
 *                with every other stripped character removed
 */
export function reinsertSpaces(
	text: string,
	spacePositions: ReadonlyArray<number>,
): string {
	const characters = Array.from(text);
	for (const position of [...spacePositions].sort((a, b) => a - b)) {
		characters.splice(Math.min(position, characters.length), 0, " ");
	}
	return characters.join("");
}

// CHANGE: Hill block transform: encode, decode, and the encrypt-then-try-decrypt demonstration
// SOURCE: https://en.wikipedia.org/wiki/Hill_cipher
// FORMAT THEOREM: isKeyValid(M, m) ⇒ ∀msg: decode(encode(msg, M).blocks, M) = blocks(pad(msg))
// FORMAT THEOREM: ¬isKeyValid(M, m) ⇒ ∀blocks: decode(blocks, M) = Left(NotInvertibleError)
// PURITY: CORE
// INVARIANT: Every block component lies in [0, m)
// COMPLEXITY: O(|msg| · n) per transform, plus O(n³) for the inverse key

import { Either, pipe } from "effect";

import {
	DimensionMismatchError,
	type InvalidSymbolError,
	type NotInvertibleError,
} from "../errors.js";
import { diagnose } from "../explain/report.js";
import { multiplyVectorMod } from "../matrix/arithmetic.js";
import { modInverseMatrix } from "../matrix/modular.js";
import { validateKey } from "../matrix/validate.js";
import type {
	CipherConfig,
	Decryption,
	EncodedMessage,
	EncryptionResult,
	Matrix,
	Vector,
} from "../types/index.js";
import {
	indicesToSymbols,
	normalizeMessage,
	reinsertSpaces,
	symbolsToIndices,
} from "./alphabet.js";
import { chunk, flattenBlocks, padToBlock } from "./blocks.js";

/**
 * Encodes `message` block by block as (M · v) mod m.
 *
 * The final block is filled with config.padSymbol.
 *
 * @returns EncodedMessage, InvalidSymbolError (strict policy), or
 *          DimensionMismatchError (bad key shape)
 *
 * @pure true
 * @postcondition Right(e) ⇒ e.blocks.length · n === |e.padded|
 *
 * @example
 * ```ts
 * encode("HI", [[3, 3], [2, 5]], STANDARD_CONFIG);
 * // Right({ padded: "HI", symbols: [7, 8], blocks: [[19, 2]], cipherText: "TC", ... })
 * ```
 */
export const encode = (
	message: string,
	key: Matrix,
	config: CipherConfig,
): Either.Either<EncodedMessage, InvalidSymbolError | DimensionMismatchError> =>
	pipe(
		validateKey(key, config.dimension),
		Either.flatMap((validKey) =>
			pipe(
				normalizeMessage(message, config),
				Either.map((normalized): EncodedMessage => {
					const n = validKey.length;
					const padded = padToBlock(
						Array.from(normalized.text),
						n,
						config.padSymbol,
					).join("");
					const symbols = symbolsToIndices(padded, config);
					const blocks = chunk(symbols, n).map((block) =>
						multiplyVectorMod(validKey, block, config.modulus),
					);
					return {
						original: message,
						normalized: normalized.text,
						padded,
						symbols,
						blocks,
						cipherText: indicesToSymbols(flattenBlocks(blocks), config),
						spacePositions: normalized.spacePositions,
					};
				}),
			),
		),
	);

const checkBlocks = (
	blocks: ReadonlyArray<Vector>,
	n: number,
): Either.Either<ReadonlyArray<Vector>, DimensionMismatchError> => {
	const bad = blocks.findIndex((block) => block.length !== n);
	if (bad === -1) return Either.right(blocks);
	const width = blocks[bad]?.length ?? 0;
	return Either.left(
		new DimensionMismatchError({
			expected: n,
			rows: blocks.length,
			columns: width,
			detail: `block ${bad + 1} has ${width} symbols, the key needs blocks of ${n}`,
		}),
	);
};

/**
 * Applies the modular inverse key block-wise.
 *
 * Fails with NotInvertibleError whenever gcd(det(M) mod m, m) ≠ 1, whatever the blocks.
 *
 * @pure true
 * @precondition blocks hold integers; they are reduced mod m
 */
export const decode = (
	blocks: ReadonlyArray<Vector>,
	key: Matrix,
	config: CipherConfig,
): Either.Either<
	ReadonlyArray<Vector>,
	NotInvertibleError | DimensionMismatchError
> =>
	pipe(
		validateKey(key, config.dimension),
		Either.flatMap((validKey) => modInverseMatrix(validKey, config.modulus)),
		Either.flatMap((inverse) =>
			pipe(
				checkBlocks(blocks, inverse.length),
				Either.map((checked) =>
					checked.map((block) =>
						multiplyVectorMod(inverse, block, config.modulus),
					),
				),
			),
		),
	);

const cipherBlocks = (
	text: string,
	n: number,
	config: CipherConfig,
): Either.Either<ReadonlyArray<Vector>, DimensionMismatchError> => {
	const symbols = symbolsToIndices(text, config);
	if (symbols.length % n === 0) return Either.right(chunk(symbols, n));
	return Either.left(
		new DimensionMismatchError({
			expected: n,
			rows: Math.ceil(symbols.length / n),
			columns: symbols.length % n,
			detail: `cipher text has ${symbols.length} symbols, not a multiple of the block size ${n}`,
		}),
	);
};

/**
 * Decodes cipher text written in the configured alphabet.
 *
 * Cipher text is always read under the `strict` policy: a symbol outside the
 * alphabet is an InvalidSymbolError even when plaintext may be stripped.
 *
 * @returns Decrypted blocks and the padded plaintext
 *
 * @pure true
 */
export const decryptText = (
	cipherText: string,
	key: Matrix,
	config: CipherConfig,
): Either.Either<
	Extract<Decryption, { readonly _tag: "Decrypted" }>,
	InvalidSymbolError | DimensionMismatchError | NotInvertibleError
> =>
	pipe(
		validateKey(key, config.dimension),
		Either.flatMap((validKey) =>
			pipe(
				normalizeMessage(cipherText, { ...config, symbolPolicy: "strict" }),
				Either.flatMap(({ text }) => cipherBlocks(text, validKey.length, config)),
				Either.flatMap((blocks) => decode(blocks, validKey, config)),
			),
		),
		Either.map((blocks) => ({
			_tag: "Decrypted" as const,
			blocks,
			message: indicesToSymbols(flattenBlocks(blocks), config),
		})),
	);

const attemptDecryption = (
	encoded: EncodedMessage,
	key: Matrix,
	config: CipherConfig,
): Either.Either<Decryption, DimensionMismatchError> => {
	const result = decode(encoded.blocks, key, config);
	if (Either.isRight(result)) {
		return Either.right({
			_tag: "Decrypted" as const,
			blocks: result.right,
			message: reinsertSpaces(
				indicesToSymbols(flattenBlocks(result.right), config),
				encoded.spacePositions,
			),
		});
	}
	const error = result.left;
	return error._tag === "NotInvertible"
		? Either.right({ _tag: "Impossible" as const, error })
		: Either.left(error);
};

/**
 * Encodes `message`, then tries to decode it again with the same key.
 *
 * A key that cannot decrypt is not a failure here: the result carries
 * `decryption: { _tag: "Impossible", error }` next to the key's diagnostics.
 *
 * @pure true
 *
 * @example
 * ```ts
 * encrypt("HELLO", presets.bad.matrix, STANDARD_CONFIG);
 * // Right({ decryption: { _tag: "Impossible", error: NotInvertibleError {...} }, ... })
 * ```
 */
export const encrypt = (
	message: string,
	key: Matrix,
	config: CipherConfig,
): Either.Either<EncryptionResult, InvalidSymbolError | DimensionMismatchError> =>
	pipe(
		encode(message, key, config),
		Either.flatMap((encoded) =>
			pipe(
				attemptDecryption(encoded, key, config),
				Either.map(
					(decryption): EncryptionResult => ({
						encoded,
						report: diagnose(key, config.modulus),
						decryption,
					}),
				),
			),
		),
	);

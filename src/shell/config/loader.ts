// CHANGE: Loads hill.config.json and layers CLI overrides on top of it
// WHY: Cipher parameters come from one place; the core never touches the file system
// PURITY: SHELL
// INVARIANT: Missing default file → built-in base; malformed file → ConfigError, never a silent fallback
// SOURCE: https://effect.website/docs/error-management/expected-errors

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Either } from "effect";

import { CONFIG_BASES, makeCipherConfig } from "../../core/config.js";
import { ConfigError } from "../../core/errors.js";
import type {
	CipherConfig,
	CipherConfigInput,
	ConfigBase,
	SymbolPolicy,
} from "../../core/types/index.js";

export const DEFAULT_CONFIG_FILE = "hill.config.json";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

function isNumber(value: JSONValue): value is number {
	return typeof value === "number";
}

function isSymbolPolicy(value: string): value is SymbolPolicy {
	return value === "strict" || value === "strip";
}

function isConfigBase(value: string): value is ConfigBase {
	return value === "standard" || value === "spaced";
}

/**
 * Contents of hill.config.json after shape checks.
 *
 * @property path Absolute path the fields were read from, null when no file was read
 * @property base Built-in configuration the file starts from
 * @property input Field overrides on top of `base`
 */
export interface ConfigFile {
	readonly path: string | null;
	readonly base: ConfigBase | null;
	readonly input: CipherConfigInput;
}

const KNOWN_KEYS: ReadonlyArray<string> = [
	"base",
	"modulus",
	"alphabet",
	"padSymbol",
	"symbolPolicy",
	"dimension",
];

const reject = (detail: string): Either.Either<ConfigFile, string> =>
	Either.left(detail);

/**
 * Checks the parsed JSON document field by field.
 *
 * @param value Parsed JSON
 * @returns The recognised fields, or the reason the document was rejected
 *
 * @pure true
 * @invariant Unknown keys and wrongly typed values are rejected
 */
export function readConfigJSON(
	value: JSONValue,
): Either.Either<ConfigFile, string> {
	if (!isJSONObject(value)) {
		return reject("top level must be a JSON object");
	}
	const unknown = Object.keys(value).find((key) => !KNOWN_KEYS.includes(key));
	if (unknown !== undefined) {
		return reject(`unknown key ${JSON.stringify(unknown)}`);
	}

	const { base, modulus, alphabet, padSymbol, symbolPolicy, dimension } = value;
	if (base !== undefined && !(isString(base) && isConfigBase(base))) {
		return reject('base must be "standard" or "spaced"');
	}
	if (modulus !== undefined && !isNumber(modulus)) {
		return reject("modulus must be a number");
	}
	if (alphabet !== undefined && !isString(alphabet)) {
		return reject("alphabet must be a string");
	}
	if (padSymbol !== undefined && !isString(padSymbol)) {
		return reject("padSymbol must be a string");
	}
	if (
		symbolPolicy !== undefined &&
		!(isString(symbolPolicy) && isSymbolPolicy(symbolPolicy))
	) {
		return reject('symbolPolicy must be "strict" or "strip"');
	}
	if (dimension !== undefined && dimension !== null && !isNumber(dimension)) {
		return reject("dimension must be a number or null");
	}

	return Either.right({
		path: null,
		base: base ?? null,
		input: {
			...(modulus === undefined ? {} : { modulus }),
			...(alphabet === undefined ? {} : { alphabet }),
			...(padSymbol === undefined ? {} : { padSymbol }),
			...(symbolPolicy === undefined ? {} : { symbolPolicy }),
			...(dimension === undefined ? {} : { dimension }),
		},
	});
}

const EMPTY_FILE: ConfigFile = { path: null, base: null, input: {} };

/**
 * Reads and checks a config file.
 *
 * @param configPath File to read, or null for ./hill.config.json
 * @returns EMPTY_FILE when the default file does not exist
 *
 * @invariant An explicitly named file that does not exist is a ConfigError
 */
export const readConfigFile = (
	configPath: string | null,
): Effect.Effect<ConfigFile, ConfigError> =>
	Effect.gen(function* () {
		const resolved =
			configPath === null
				? path.resolve(process.cwd(), DEFAULT_CONFIG_FILE)
				: path.resolve(configPath);

		if (configPath === null && !fs.existsSync(resolved)) {
			return EMPTY_FILE;
		}

		const raw = yield* Effect.try({
			try: () => fs.readFileSync(resolved, "utf8"),
			catch: (error) =>
				new ConfigError({
					path: resolved,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		const parsed = yield* Effect.try({
			try: (): JSONValue => JSON.parse(raw),
			catch: (error) =>
				new ConfigError({
					path: resolved,
					detail: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
				}),
		});

		const checked = yield* Either.mapLeft(
			readConfigJSON(parsed),
			(detail) => new ConfigError({ path: resolved, detail }),
		);
		return { ...checked, path: resolved };
	});

/**
 * Resolves the effective cipher configuration.
 *
 * Precedence, lowest first: built-in base, file fields, CLI overrides.
 * The base is the CLI's choice, else the file's, else "standard".
 *
 * @example
 * ```ts
 * const config = yield* loadCipherConfig(null, null, { modulus: 27, alphabet: " ABCDEFGHIJKLMNOPQRSTUVWXYZ" });
 * ```
 */
export const loadCipherConfig = (
	configPath: string | null,
	base: ConfigBase | null,
	overrides: CipherConfigInput,
): Effect.Effect<CipherConfig, ConfigError> =>
	Effect.gen(function* () {
		const file = yield* readConfigFile(configPath);
		const start = CONFIG_BASES[base ?? file.base ?? "standard"];
		const fromFile = yield* Either.mapLeft(
			makeCipherConfig(file.input, start),
			(error) =>
				file.path === null
					? error
					: new ConfigError({ path: file.path, detail: error.detail }),
		);
		return yield* makeCipherConfig(overrides, fromFile);
	});

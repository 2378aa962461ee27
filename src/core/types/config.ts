// CHANGE: Cipher configuration and CLI option types
// WHY: Modulus and alphabet travel as an explicit immutable value into every engine call
// PURITY: CORE
// INVARIANT: CipherConfig is only produced by makeCipherConfig, which checks its invariants

/**
 * What encode does with characters that are not in the alphabet.
 *
 * - `strict`: fail with InvalidSymbolError
 * - `strip`: drop them; dropped spaces are reinserted after decoding
 */
export type SymbolPolicy = "strict" | "strip";

/**
 * Validated cipher configuration.
 *
 * @property modulus Size of the ring Z_m all cipher arithmetic lives in
 * @property alphabet Symbol at index i encodes integer i
 * @property padSymbol Fills the final block up to the key dimension
 * @property symbolPolicy Handling of out-of-alphabet characters
 * @property dimension Required key size, or null for any n×n key
 *
 * @invariant alphabet.length === modulus ∧ modulus >= 2
 * @invariant alphabet has no repeated symbol ∧ alphabet.includes(padSymbol)
 */
export interface CipherConfig {
	readonly modulus: number;
	readonly alphabet: string;
	readonly padSymbol: string;
	readonly symbolPolicy: SymbolPolicy;
	readonly dimension: number | null;
}

/**
 * Unvalidated configuration as read from hill.config.json or CLI flags.
 */
export type CipherConfigInput = {
	readonly [K in keyof CipherConfig]?: CipherConfig[K];
};

/**
 * Named starting points a configuration can build on.
 */
export type ConfigBase = "standard" | "spaced";

/**
 * Commands understood by the hill-lab binary.
 */
export type Command =
	| "explain"
	| "encrypt"
	| "decrypt"
	| "collide"
	| "square"
	| "lesson"
	| "presets";

/**
 * Parsed command line.
 *
 * @property key Raw matrix text ("a,b;c,d") or null
 * @property preset Preset key name or null
 * @property base Base configuration chosen by flag, or null to defer to the file
 * @property overrides Config values given as flags; they win over the file
 * @property configPath Explicit config file, or null for ./hill.config.json
 */
export interface CLIOptions {
	readonly command: Command;
	readonly key: string | null;
	readonly preset: string | null;
	readonly message: string | null;
	readonly cipher: string | null;
	readonly base: ConfigBase | null;
	readonly overrides: CipherConfigInput;
	readonly configPath: string | null;
}

// CHANGE: Command-line parsing for hill-lab
// WHY: Flags and the command word turn into one immutable CLIOptions value before any work starts
// PURITY: SHELL (reads process.argv in parseCLIArgs; parseArgs itself is pure)
// INVARIANT: Unknown commands, unknown flags and flags missing their value are UsageError, never ignored

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type {
	CipherConfigInput,
	CLIOptions,
	Command,
	ConfigBase,
} from "../../core/types/index.js";

export const USAGE: ReadonlyArray<string> = [
	"Usage: hill-lab [command] [options] [text]",
	"",
	"Commands:",
	"  explain   Diagnose a key: determinant, rank, nullity, inverse (default)",
	"  encrypt   Encrypt --message and try to decrypt it again",
	"  decrypt   Decrypt --cipher; exits 1 when the key is not invertible",
	"  collide   Show two plaintext blocks that encrypt to the same cipher block",
	"  square    Show where a 2×2 key sends the unit square",
	"  lesson    Print the linear-algebra lesson for the configured modulus",
	"  presets   List the built-in example keys",
	"",
	"Options:",
	'  --key "a,b;c,d"     Key matrix, rows separated by ";"',
	"  --preset NAME       Use a built-in key (see `hill-lab presets`)",
	"  --message TEXT      Plaintext for encrypt",
	"  --cipher TEXT       Cipher text for decrypt",
	"  --modulus N         Modulus of the cipher alphabet",
	"  --alphabet SYMBOLS  Alphabet, one symbol per residue",
	"  --pad SYMBOL        Symbol used to fill the last block",
	"  --dimension N       Require an N×N key",
	"  --strip             Drop characters outside the alphabet instead of failing",
	"  --strict            Fail on characters outside the alphabet",
	"  --spaced            Start from the 27-symbol alphabet with space",
	"  --config PATH       Read configuration from PATH (default ./hill.config.json)",
];

const COMMANDS: ReadonlyArray<Command> = [
	"explain",
	"encrypt",
	"decrypt",
	"collide",
	"square",
	"lesson",
	"presets",
];

const isCommand = (word: string): word is Command =>
	COMMANDS.some((command) => command === word);

/**
 * Parser state; `command` stays null until a command word is seen.
 */
interface ParseState {
	readonly command: Command | null;
	readonly key: string | null;
	readonly preset: string | null;
	readonly message: string | null;
	readonly cipher: string | null;
	readonly base: ConfigBase | null;
	readonly overrides: CipherConfigInput;
	readonly configPath: string | null;
}

const INITIAL_STATE: ParseState = {
	command: null,
	key: null,
	preset: null,
	message: null,
	cipher: null,
	base: null,
	overrides: {},
	configPath: null,
};

type Step = Either.Either<ParseState, UsageError>;

type ValueFlagHandler = (value: string, flag: string, state: ParseState) => Step;
type SwitchFlagHandler = (state: ParseState) => ParseState;

const usage = (detail: string): Step =>
	Either.left(new UsageError({ detail }));

// CHANGE: Numeric flags share one handler factory
// WHY: --modulus and --dimension differ only in the override they set
function createIntegerFlagHandler(
	key: "modulus" | "dimension",
): ValueFlagHandler {
	return (value, flag, state) => {
		const parsed = Number(value);
		if (value.trim().length === 0 || !Number.isSafeInteger(parsed)) {
			return usage(`${flag} expects an integer, got ${JSON.stringify(value)}`);
		}
		const overrides: CipherConfigInput =
			key === "modulus"
				? { ...state.overrides, modulus: parsed }
				: { ...state.overrides, dimension: parsed };
		return Either.right({ ...state, overrides });
	};
}

const valueHandlers: Readonly<Record<string, ValueFlagHandler>> = {
	"--key": (value, _flag, state) => Either.right({ ...state, key: value }),
	"--preset": (value, _flag, state) =>
		Either.right({ ...state, preset: value }),
	"--message": (value, _flag, state) =>
		Either.right({ ...state, message: value }),
	"--cipher": (value, _flag, state) =>
		Either.right({ ...state, cipher: value }),
	"--config": (value, _flag, state) =>
		Either.right({ ...state, configPath: value }),
	"--alphabet": (value, _flag, state) =>
		Either.right({
			...state,
			overrides: { ...state.overrides, alphabet: value },
		}),
	"--pad": (value, _flag, state) =>
		Either.right({
			...state,
			overrides: { ...state.overrides, padSymbol: value },
		}),
	"--modulus": createIntegerFlagHandler("modulus"),
	"--dimension": createIntegerFlagHandler("dimension"),
};

const switchHandlers: Readonly<Record<string, SwitchFlagHandler>> = {
	"--strip": (state) => ({
		...state,
		overrides: { ...state.overrides, symbolPolicy: "strip" },
	}),
	"--strict": (state) => ({
		...state,
		overrides: { ...state.overrides, symbolPolicy: "strict" },
	}),
	"--spaced": (state) => ({ ...state, base: "spaced" }),
};

const lookup = <H>(
	table: Readonly<Record<string, H>>,
	flag: string,
): H | undefined => (Object.hasOwn(table, flag) ? table[flag] : undefined);

// CHANGE: Bare words pick the command first, then fill the text slot
// WHY: `hill-lab decrypt TCXY --preset classic` reads the same as --cipher TCXY
function applyPositional(word: string, state: ParseState): Step {
	if (state.command === null) {
		return isCommand(word)
			? Either.right({ ...state, command: word })
			: usage(
					`unknown command ${JSON.stringify(word)}; expected one of ${COMMANDS.join(", ")}`,
				);
	}
	if (state.command === "decrypt") {
		return state.cipher === null
			? Either.right({ ...state, cipher: word })
			: usage(`unexpected argument ${JSON.stringify(word)}`);
	}
	return state.message === null
		? Either.right({ ...state, message: word })
		: usage(`unexpected argument ${JSON.stringify(word)}`);
}

/**
 * Parses an argument vector into CLIOptions.
 *
 * @pure true
 * @invariant Right(o) ⇒ o.command ∈ Command (defaults to "explain")
 *
 * @example
 * ```ts
 * parseArgs(["encrypt", "--preset", "classic", "--message", "HI"]);
 * // Right({ command: "encrypt", preset: "classic", message: "HI", ... })
 * parseArgs(["--modulus", "x"]);
 * // Left(UsageError: --modulus expects an integer, got "x")
 * ```
 */
export function parseArgs(
	args: ReadonlyArray<string>,
): Either.Either<CLIOptions, UsageError> {
	let state: ParseState = INITIAL_STATE;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (arg.length === 0) continue;

		const valueHandler = lookup(valueHandlers, arg);
		const switchHandler = lookup(switchHandlers, arg);
		let step: Step;
		if (valueHandler !== undefined) {
			const value = args[i + 1];
			if (value === undefined) {
				return Either.left(new UsageError({ detail: `${arg} needs a value` }));
			}
			step = valueHandler(value, arg, state);
			i++;
		} else if (switchHandler !== undefined) {
			step = Either.right(switchHandler(state));
		} else if (arg.startsWith("--")) {
			step = usage(`unknown option ${arg}`);
		} else {
			step = applyPositional(arg, state);
		}

		if (Either.isLeft(step)) {
			return Either.left(step.left);
		}
		state = step.right;
	}

	return Either.right({ ...state, command: state.command ?? "explain" });
}

/**
 * Parses the arguments of the running process.
 *
 * @example
 * ```ts
 * // Command: hill-lab explain --key "1,2;3,4" --modulus 26
 * const options = parseCLIArgs();
 * // Right({ command: "explain", key: "1,2;3,4", overrides: { modulus: 26 }, ... })
 * ```
 */
export function parseCLIArgs(): Either.Either<CLIOptions, UsageError> {
	return parseArgs(process.argv.slice(2));
}

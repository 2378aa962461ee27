// CHANGE: Application layer for hill-lab: resolve config and key, run one command, report
// WHY: APP composes the pure cipher engine with SHELL config loading and printing
// PURITY: APP (no process.exit; console output only through SHELL printers)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every AppError is printed once and turned into an exit code; nothing escapes as a defect
// COMPLEXITY: O(command) — dominated by the engine call; collide searches up to COLLISION_SEARCH_LIMIT vectors

import { Effect, Either, Option, pipe } from "effect";
import { match } from "ts-pattern";

import { decryptText, encrypt } from "../core/cipher/hill.js";
import { computeExitCode } from "../core/decision.js";
import type { AppError, MatrixParseError } from "../core/errors.js";
import { UsageError } from "../core/errors.js";
import { findCollision } from "../core/explain/collision.js";
import { lessonFor } from "../core/explain/lesson.js";
import { explain } from "../core/explain/report.js";
import {
	formatCollision,
	formatEncryption,
	formatLesson,
	formatPresets,
	formatReport,
	formatUnitSquare,
} from "../core/format/report.js";
import { transformUnitSquare } from "../core/geometry/unit-square.js";
import type { DecisionState, ExitCode } from "../core/models.js";
import { parseMatrix } from "../core/parse/matrix.js";
import { findPreset, presets } from "../core/presets.js";
import type {
	CipherConfig,
	CLIOptions,
	Command,
	Matrix,
} from "../core/types/index.js";
import { loadCipherConfig, parseCLIArgs, USAGE } from "../shell/config/index.js";
import { printError, printLines, printSection } from "../shell/output/index.js";

export const DEFAULT_PRESET = "good";

/**
 * Picks the key from --preset or --key; the "good" preset when neither is given.
 *
 * @pure true
 * @invariant --key and --preset together are a UsageError
 */
export function resolveKey(
	cli: Pick<CLIOptions, "key" | "preset">,
): Either.Either<Matrix, MatrixParseError | UsageError> {
	if (cli.key !== null && cli.preset !== null) {
		return Either.left(
			new UsageError({ detail: "use either --key or --preset, not both" }),
		);
	}
	if (cli.key !== null) {
		return parseMatrix(cli.key);
	}
	const name = cli.preset ?? DEFAULT_PRESET;
	return pipe(
		findPreset(name),
		Option.map((preset) => preset.matrix),
		Either.fromOption(
			() =>
				new UsageError({
					detail: `unknown preset ${JSON.stringify(name)}; run \`hill-lab presets\` to list them`,
				}),
		),
	);
}

const requireText = (
	value: string | null,
	flag: string,
	command: Command,
): Either.Either<string, UsageError> =>
	value === null
		? Either.left(new UsageError({ detail: `${command} needs ${flag} TEXT` }))
		: Either.right(value);

/**
 * Runs the selected command and prints its result.
 *
 * @effect Effect<void, AppError>
 */
export function runCommand(
	cli: CLIOptions,
	config: CipherConfig,
): Effect.Effect<void, AppError> {
	const m = config.modulus;
	return match<Command, Effect.Effect<void, AppError>>(cli.command)
		.with("explain", () =>
			Effect.gen(function* () {
				const key = yield* resolveKey(cli);
				const report = yield* explain(key, config);
				yield* printSection("Key diagnostics", formatReport(report));
			}),
		)
		.with("encrypt", () =>
			Effect.gen(function* () {
				const message = yield* requireText(cli.message, "--message", "encrypt");
				const key = yield* resolveKey(cli);
				const result = yield* encrypt(message, key, config);
				yield* printSection("Key diagnostics", formatReport(result.report));
				yield* printSection("Encryption", formatEncryption(result));
			}),
		)
		.with("decrypt", () =>
			Effect.gen(function* () {
				const cipher = yield* requireText(cli.cipher, "--cipher", "decrypt");
				const key = yield* resolveKey(cli);
				const result = yield* decryptText(cipher, key, config);
				yield* printSection("Decryption", [
					`Cipher text: "${cipher}"`,
					`Plaintext: "${result.message}"`,
				]);
			}),
		)
		.with("collide", () =>
			Effect.gen(function* () {
				const key = yield* resolveKey(cli);
				const collision = yield* findCollision(key, config);
				yield* printSection("Collision", formatCollision(collision, m));
			}),
		)
		.with("square", () =>
			Effect.gen(function* () {
				const key = yield* resolveKey(cli);
				const image = yield* transformUnitSquare(key);
				yield* printSection("Unit square", formatUnitSquare(image));
			}),
		)
		.with("lesson", () =>
			printSection(`Lesson (mod ${m})`, formatLesson(lessonFor(m))),
		)
		.with("presets", () =>
			printSection("Presets", formatPresets(Object.entries(presets))),
		)
		.exhaustive();
}

const SUCCESS: DecisionState = { failed: false, decryptionRefused: false };

/**
 * Decision flags for a command that stopped with `error`.
 *
 * @pure true
 * @postcondition error is NotInvertible ↔ result.decryptionRefused
 */
export const failureState = (error: AppError): DecisionState =>
	error._tag === "NotInvertible"
		? { failed: false, decryptionRefused: true }
		: { failed: true, decryptionRefused: false };

/**
 * Loads the configuration, runs the command and maps the outcome to an exit code.
 *
 * @returns Effect<ExitCode, never>
 *
 * @pure false (reads the config file, writes to the console), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 * @postcondition decrypt with a key that has no inverse modulo m → 1
 * @postcondition encrypt with such a key → 0 (the failed decryption is part of the report)
 */
export function runHillLab(cli: CLIOptions): Effect.Effect<ExitCode, never> {
	return Effect.gen(function* () {
		const state = yield* Effect.gen(function* () {
			const config = yield* loadCipherConfig(
				cli.configPath,
				cli.base,
				cli.overrides,
			);
			console.log(
				`🔍 hill-lab ${cli.command}: modulus ${config.modulus}, alphabet "${config.alphabet}"`,
			);
			yield* runCommand(cli, config);
			return SUCCESS;
		}).pipe(
			Effect.catchAll((error) =>
				printError(error).pipe(Effect.as(failureState(error))),
			),
		);
		return computeExitCode(state);
	});
}

/**
 * Main entry point: parse process arguments and delegate to runHillLab.
 *
 * @returns Effect<ExitCode, never>
 * @complexity O(1) - orchestration only
 */
export function main(): Effect.Effect<ExitCode, never> {
	return Either.match(parseCLIArgs(), {
		onLeft: (error) =>
			Effect.gen(function* () {
				yield* printError(error);
				yield* printLines(USAGE);
				return computeExitCode(failureState(error));
			}),
		onRight: runHillLab,
	});
}

// CHANGE: Console output for hill-lab commands
// WHY: Printing is the only side effect of a command; CORE builds the lines, this module writes them
// PURITY: SHELL
// EFFECT: Effect<void, never>
// INVARIANT: Results go to stdout, errors to stderr

import { Effect } from "effect";

import type { AppError } from "../../core/errors.js";
import { describeError } from "../../core/format/report.js";

/**
 * Writes each line to stdout.
 */
export const printLines = (
	lines: ReadonlyArray<string>,
): Effect.Effect<void> =>
	Effect.sync(() => {
		for (const line of lines) {
			console.log(line);
		}
	});

/**
 * Section banner in the `=== title ===` form.
 */
export const printSection = (
	title: string,
	lines: ReadonlyArray<string>,
): Effect.Effect<void> =>
	Effect.gen(function* () {
		console.log(`\n=== ${title} ===`);
		yield* printLines(lines);
	});

/**
 * Writes a one-line error description to stderr.
 */
export const printError = (error: AppError): Effect.Effect<void> =>
	Effect.sync(() => {
		console.error(`❌ ${describeError(error)}`);
	});

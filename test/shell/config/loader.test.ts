// CHANGE: Config file loading and precedence
// INVARIANT: Missing default file → built-in base; malformed file → ConfigError

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SPACED_CONFIG, STANDARD_CONFIG } from "../../../src/core/config.js";
import type { CipherConfig } from "../../../src/core/types/index.js";
import type { ConfigError } from "../../../src/core/errors.js";
import {
	loadCipherConfig,
	readConfigJSON,
} from "../../../src/shell/config/index.js";
import { leftOf, rightOf } from "../../utils/builders.js";

let dir = "";

beforeEach(() => {
	dir = fs.mkdtempSync(path.join(os.tmpdir(), "hill-lab-"));
	vi.spyOn(process, "cwd").mockReturnValue(dir);
});

afterEach(() => {
	fs.rmSync(dir, { recursive: true, force: true });
});

const writeConfig = (name: string, content: string): string => {
	const file = path.join(dir, name);
	fs.writeFileSync(file, content, "utf8");
	return file;
};

const load = (
	...args: Parameters<typeof loadCipherConfig>
): Promise<Either.Either<CipherConfig, ConfigError>> =>
	Effect.runPromise(Effect.either(loadCipherConfig(...args)));

describe("readConfigJSON", () => {
	it("keeps the recognised fields", () => {
		expect(
			rightOf(readConfigJSON({ base: "spaced", padSymbol: "Z", dimension: null })),
		).toEqual({
			path: null,
			base: "spaced",
			input: { padSymbol: "Z", dimension: null },
		});
	});

	it("rejects documents of the wrong shape", () => {
		expect(leftOf(readConfigJSON([1]))).toBe("top level must be a JSON object");
		expect(leftOf(readConfigJSON({ colour: "red" }))).toBe('unknown key "colour"');
		expect(leftOf(readConfigJSON({ modulus: "27" }))).toBe("modulus must be a number");
		expect(leftOf(readConfigJSON({ base: "fancy" }))).toBe(
			'base must be "standard" or "spaced"',
		);
		expect(leftOf(readConfigJSON({ symbolPolicy: "lenient" }))).toBe(
			'symbolPolicy must be "strict" or "strip"',
		);
		expect(leftOf(readConfigJSON({ dimension: "2" }))).toBe(
			"dimension must be a number or null",
		);
	});
});

describe("loadCipherConfig", () => {
	it("falls back to the standard configuration without a config file", async () => {
		expect(rightOf(await load(null, null, {}))).toEqual(STANDARD_CONFIG);
	});

	it("reads ./hill.config.json from the working directory", async () => {
		writeConfig("hill.config.json", JSON.stringify({ base: "spaced", dimension: 2 }));
		expect(rightOf(await load(null, null, {}))).toEqual({
			...SPACED_CONFIG,
			dimension: 2,
		});
	});

	it("lets CLI overrides and the CLI base win over the file", async () => {
		const file = writeConfig("lab.json", JSON.stringify({ base: "standard", padSymbol: "X" }));
		const config = rightOf(await load(file, "spaced", { padSymbol: "Q" }));
		expect(config.modulus).toBe(27);
		expect(config.padSymbol).toBe("Q");
	});

	it("fails when an explicitly named file is missing", async () => {
		const missing = path.join(dir, "missing.json");
		const error = leftOf(await load(missing, null, {}));
		expect(error._tag).toBe("Config");
		expect(error.path).toBe(missing);
	});

	it("reports invalid JSON with the file path", async () => {
		const file = writeConfig("hill.config.json", "{");
		const error = leftOf(await load(null, null, {}));
		expect(error.path).toBe(file);
		expect(error.detail).toMatch(/^invalid JSON: /u);
	});

	it("reports inconsistent file fields with the file path", async () => {
		const file = writeConfig("hill.config.json", JSON.stringify({ modulus: 27 }));
		const error = leftOf(await load(null, null, {}));
		expect(error.path).toBe(file);
		expect(error.detail).toBe(
			"alphabet has 26 symbols but modulus is 27; they must match",
		);
	});

	it("reports inconsistent overrides without a path", async () => {
		const error = leftOf(await load(null, null, { modulus: 27 }));
		expect(error.path).toBeUndefined();
		expect(error.detail).toBe(
			"alphabet has 26 symbols but modulus is 27; they must match",
		);
	});
});

// CHANGE: Architecture rules are checked against in-memory fixtures and the real source tree
// INVARIANT: The real src tree produces no violations

import { fileURLToPath } from "node:url";

import { Project } from "ts-morph";
import { describe, expect, it } from "vitest";

import {
	checkAppLayerDependencies,
	checkCoreDocs,
	checkCoreImports,
	checkCorePurity,
	checkSingleExit,
	collectViolations,
} from "../scripts/architecture.js";

const fixture = (filePath: string, text: string) =>
	new Project({ useInMemoryFileSystem: true }).createSourceFile(filePath, text);

const rules = (violations: ReadonlyArray<{ readonly rule: string }>) =>
	violations.map((violation) => violation.rule);

describe("checkCoreImports", () => {
	it("flags SHELL and node: imports from CORE", () => {
		const file = fixture(
			"/repo/src/core/bad.ts",
			[
				'import { printLines } from "../shell/output/index.js";',
				'import * as fs from "node:fs";',
				'import { Either } from "effect";',
			].join("\n"),
		);
		const violations = checkCoreImports(file);
		expect(rules(violations)).toEqual(["core-no-shell-imports", "core-no-node-builtins"]);
		expect(violations[1]?.line).toBe(2);
	});

	it("ignores files outside CORE", () => {
		const file = fixture("/repo/src/app/run.ts", 'import * as fs from "node:fs";');
		expect(checkCoreImports(file)).toEqual([]);
	});
});

describe("checkCorePurity", () => {
	it("flags console and clock access in CORE", () => {
		const file = fixture(
			"/repo/src/core/noisy.ts",
			'export const f = () => { console.log("x"); return Date.now(); };',
		);
		expect(checkCorePurity(file).map((violation) => violation.message)).toEqual([
			"CORE contains side effect: console.log",
			"CORE contains side effect: Date.now",
		]);
	});
});

describe("checkSingleExit", () => {
	it("allows process.exit only in BIN", () => {
		const code = "process.exit(1);";
		expect(checkSingleExit(fixture("/repo/src/bin/cli.ts", code))).toEqual([]);
		expect(rules(checkSingleExit(fixture("/repo/src/app/run.ts", code)))).toEqual([
			"bin-only-exit",
		]);
	});
});

describe("checkCoreDocs", () => {
	it("warns about exported CORE functions without @pure", () => {
		const file = fixture(
			"/repo/src/core/docs.ts",
			[
				"/**",
				" * @pure true",
				" */",
				"export function documented(): number { return 1; }",
				"",
				"/** Adds one. */",
				"export function undocumented(x: number): number { return x + 1; }",
				"",
				"function local(): void {}",
			].join("\n"),
		);
		const violations = checkCoreDocs(file);
		expect(violations.map((violation) => violation.message)).toEqual([
			"Function 'undocumented' lacks a JSDoc @pure tag",
		]);
		expect(violations[0]?.severity).toBe("warning");
	});
});

describe("checkAppLayerDependencies", () => {
	it("accepts effect, ts-pattern and relative imports only", () => {
		const file = fixture(
			"/repo/src/app/run.ts",
			[
				'import { Effect } from "effect";',
				'import { Schema } from "effect/Schema";',
				'import { match } from "ts-pattern";',
				'import { x } from "../core/x.js";',
				'import chalk from "chalk";',
			].join("\n"),
		);
		expect(
			checkAppLayerDependencies(file).map((violation) => violation.message),
		).toEqual(["APP layer imports unexpected external dependency: chalk"]);
	});
});

describe("collectViolations", () => {
	it("finds nothing in the real source tree", () => {
		const project = new Project({ skipAddingFilesFromTsConfig: true });
		project.addSourceFilesAtPaths(
			`${fileURLToPath(new URL("../src", import.meta.url))}/**/*.ts`,
		);
		expect(project.getSourceFiles().length).toBeGreaterThan(0);
		expect(collectViolations(project)).toEqual([]);
	});
});

// CHANGE: Command-line runner for the architecture checks
// WHY: `tsx scripts/verify-architecture.ts` prints violations and fails on errors
// PURITY: SHELL (reads filesystem via ts-morph, exits the process)
// INVARIANT: errors.length = 0 → exit(0), else exit(1)

import { Project } from "ts-morph";

import { collectViolations } from "./architecture.js";

function verifyArchitecture(): void {
	console.log("🔍 Verifying architecture rules...\n");

	const project = new Project({ skipAddingFilesFromTsConfig: true });
	project.addSourceFilesAtPaths("src/**/*.ts");

	const violations = collectViolations(project);
	const errors = violations.filter((v) => v.severity === "error");
	const warnings = violations.filter((v) => v.severity === "warning");

	for (const v of errors) {
		console.error(`  [ERROR] ${v.file}:${v.line}\n  Rule: ${v.rule}\n  ${v.message}\n`);
	}
	for (const v of warnings) {
		console.warn(`  [WARN] ${v.file}:${v.line}\n  Rule: ${v.rule}\n  ${v.message}\n`);
	}

	if (violations.length === 0) {
		console.log("✅ Architecture verification passed!");
		console.log("   - CORE does not import SHELL, APP or Node.js modules");
		console.log("   - CORE has no console, process, clock or random access");
		console.log("   - process.exit appears only in BIN");
		return;
	}

	console.error(`\n📊 Total: ${errors.length} errors, ${warnings.length} warnings\n`);
	if (errors.length > 0) {
		process.exit(1);
	}
}

verifyArchitecture();

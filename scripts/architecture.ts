// CHANGE: Architecture rules for the hill-lab source tree, checked with ts-morph
// WHY: CORE never imports SHELL or APP, CORE has no console or process access, only BIN exits
// FORMAT THEOREM: ∀ file ∈ Core: dependencies(file) ⊆ Core ∪ {effect, ts-pattern}
// PURITY: SHELL when given a Project backed by the file system; the checks themselves only read the AST
// INVARIANT: Returns violations or empty array
// COMPLEXITY: O(n) where n = number of AST nodes

import { Node, type Project, type SourceFile } from "ts-morph";

export interface ArchitectureViolation {
	readonly file: string;
	readonly line: number;
	readonly rule: string;
	readonly message: string;
	readonly severity: "error" | "warning";
}

const inLayer = (sourceFile: SourceFile, layer: string): boolean =>
	sourceFile.getFilePath().includes(`/src/${layer}/`);

/**
 * CORE must not import SHELL or APP.
 *
 * @invariant ∀ f ∈ Core: imports(f) ∩ (Shell ∪ App) = ∅
 * @complexity O(m) where m = number of imports in file
 */
export function checkCoreImports(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!inLayer(sourceFile, "core")) return [];

	const violations: ArchitectureViolation[] = [];
	for (const importDecl of sourceFile.getImportDeclarations()) {
		const moduleSpecifier = importDecl.getModuleSpecifierValue();
		for (const layer of ["shell", "app", "bin"]) {
			if (moduleSpecifier.includes(`/${layer}/`)) {
				violations.push({
					file: sourceFile.getFilePath(),
					line: importDecl.getStartLineNumber(),
					rule: `core-no-${layer}-imports`,
					message: `CORE file imports ${layer.toUpperCase()}: ${moduleSpecifier}`,
					severity: "error",
				});
			}
		}
		if (moduleSpecifier.startsWith("node:")) {
			violations.push({
				file: sourceFile.getFilePath(),
				line: importDecl.getStartLineNumber(),
				rule: "core-no-node-builtins",
				message: `CORE file imports a Node.js module: ${moduleSpecifier}`,
				severity: "error",
			});
		}
	}
	return violations;
}

const IMPURE_ACCESS: ReadonlyArray<string> = [
	"console.log",
	"console.error",
	"console.warn",
	"process.exit",
	"process.env",
	"process.argv",
	"Math.random",
	"Date.now",
];

/**
 * CORE must not touch the console, the process, the clock or randomness.
 *
 * @invariant ∀ f ∈ CoreFunctions: ¬hasSideEffects(f)
 * @complexity O(n) where n = number of nodes in AST
 */
export function checkCorePurity(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!inLayer(sourceFile, "core")) return [];

	const violations: ArchitectureViolation[] = [];
	sourceFile.forEachDescendant((node) => {
		if (!Node.isPropertyAccessExpression(node)) return;
		const text = node.getText();
		if (IMPURE_ACCESS.includes(text)) {
			violations.push({
				file: sourceFile.getFilePath(),
				line: node.getStartLineNumber(),
				rule: "core-purity",
				message: `CORE contains side effect: ${text}`,
				severity: "error",
			});
		}
	});
	return violations;
}

/**
 * process.exit appears only in BIN.
 *
 * @invariant ∀ f ∉ Bin: ¬calls(f, process.exit)
 */
export function checkSingleExit(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (inLayer(sourceFile, "bin")) return [];

	const violations: ArchitectureViolation[] = [];
	sourceFile.forEachDescendant((node) => {
		if (
			Node.isPropertyAccessExpression(node) &&
			node.getText() === "process.exit"
		) {
			violations.push({
				file: sourceFile.getFilePath(),
				line: node.getStartLineNumber(),
				rule: "bin-only-exit",
				message: "process.exit outside the BIN layer",
				severity: "error",
			});
		}
	});
	return violations;
}

/**
 * Exported CORE functions carry a JSDoc block with a @pure tag.
 *
 * @invariant ∀ f ∈ ExportedFunctions(Core): hasDocumentation(f)
 */
export function checkCoreDocs(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!inLayer(sourceFile, "core")) return [];

	const violations: ArchitectureViolation[] = [];
	for (const func of sourceFile.getFunctions()) {
		if (!func.isExported()) continue;
		const docText = func
			.getJsDocs()
			.map((doc) => doc.getFullText())
			.join("\n");
		if (!docText.includes("@pure")) {
			violations.push({
				file: sourceFile.getFilePath(),
				line: func.getStartLineNumber(),
				rule: "core-docs",
				message: `Function '${func.getName() ?? "<anonymous>"}' lacks a JSDoc @pure tag`,
				severity: "warning",
			});
		}
	}
	return violations;
}

/**
 * APP imports only effect, ts-pattern and its own layers.
 *
 * @invariant ∀ f ∈ App: external_deps(f) ⊆ allowed_frameworks
 */
export function checkAppLayerDependencies(
	sourceFile: SourceFile,
): readonly ArchitectureViolation[] {
	if (!inLayer(sourceFile, "app")) return [];

	const allowedFrameworks = ["effect", "ts-pattern"];
	const violations: ArchitectureViolation[] = [];
	for (const importDecl of sourceFile.getImportDeclarations()) {
		const moduleSpecifier = importDecl.getModuleSpecifierValue();
		if (moduleSpecifier.startsWith(".")) continue;
		const isAllowed = allowedFrameworks.some(
			(fw) => moduleSpecifier === fw || moduleSpecifier.startsWith(`${fw}/`),
		);
		if (!isAllowed) {
			violations.push({
				file: sourceFile.getFilePath(),
				line: importDecl.getStartLineNumber(),
				rule: "app-layer-dependencies",
				message: `APP layer imports unexpected external dependency: ${moduleSpecifier}`,
				severity: "warning",
			});
		}
	}
	return violations;
}

/**
 * Runs every check over every source file of `project`.
 *
 * @complexity O(n * m) where n = files, m = avg nodes per file
 */
export function collectViolations(
	project: Project,
): readonly ArchitectureViolation[] {
	return project
		.getSourceFiles()
		.filter((sourceFile) => !sourceFile.getFilePath().includes("node_modules"))
		.flatMap((sourceFile) => [
			...checkCoreImports(sourceFile),
			...checkCorePurity(sourceFile),
			...checkSingleExit(sourceFile),
			...checkCoreDocs(sourceFile),
			...checkAppLayerDependencies(sourceFile),
		]);
}

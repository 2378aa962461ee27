// CHANGE: Central export file for all core type definitions
// WHY: Single import point for types used across modules

export type {
	CipherConfig,
	CipherConfigInput,
	CLIOptions,
	Command,
	ConfigBase,
	SymbolPolicy,
} from "./config.js";
export type { Matrix, Vector } from "./matrix.js";
export type {
	Collision,
	Decryption,
	DiagnosticReport,
	EncodedMessage,
	EncryptionResult,
	Point,
	UnitSquareImage,
	Verdict,
} from "./report.js";

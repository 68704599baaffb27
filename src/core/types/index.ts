// CHANGE: Central export file for gate type definitions
// WHY: Single import point for types used across CORE, SHELL and APP

export {
	type CLIOptions,
	DEFAULT_GATE_OPTIONS,
	type GateOptions,
	type GateOverrides,
} from "./config.js";

// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and CORE utilities; SHELL internals stay private
// PURITY: Re-exports only (meta-module)
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Gate orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { DEFAULT_GATE_OPTIONS, runGate } from "lint-gate";
 *
 * const exitCode = await Effect.runPromise(
 *   runGate({ ...DEFAULT_GATE_OPTIONS, projectDir: "backend" }),
 * );
 * ```
 */
export {
	defaultGateDependencies,
	type GateDependencies,
	runGate,
	runGateFromCli,
} from "./app/runGate.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode, computeExitCodeEffect } from "./core/decision.js";
export { activateEnvironment, environmentLayout } from "./core/environment.js";
export {
	ConfigError,
	EnvironmentMissing,
	type GateError,
	LinterNotFound,
	LinterSpawnError,
	ProjectDirMissing,
} from "./core/errors.js";
export type {
	ActivatedEnvironment,
	EnvironmentLayout,
	ExitCode,
	LinterExit,
	PlatformKind,
} from "./core/models.js";
export {
	type CLIOptions,
	DEFAULT_GATE_OPTIONS,
	type GateOptions,
	type GateOverrides,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS RUNNER CONTRACT
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	LinterInvocation,
	LinterRunner,
} from "./shell/linters/index.js";

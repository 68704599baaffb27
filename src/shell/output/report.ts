// CHANGE: Console reporting for gate failures and results
// WHY: Errors stay typed until this boundary; here they become one English line each
// PURITY: SHELL (console output)
// INVARIANT: Linter output is never echoed or rewritten here

import { match } from "ts-pattern";

import type { GateError } from "../../core/errors.js";
import type { ExitCode, LinterExit } from "../../core/models.js";

/**
 * Renders a gate failure as a single message.
 *
 * @pure true
 */
export function describeGateError(error: GateError): string {
	return match(error)
		.with(
			{ _tag: "ProjectDirMissing" },
			(e) => `Project directory not found: ${e.path}`,
		)
		.with(
			{ _tag: "EnvironmentMissing", reason: "noDirectory" },
			(e) => `Dependency environment not found: ${e.envDir}`,
		)
		.with(
			{ _tag: "EnvironmentMissing", reason: "noActivateScript" },
			(e) => `Dependency environment cannot be activated: ${e.envDir}`,
		)
		.with(
			{ _tag: "LinterNotFound" },
			(e) =>
				`Linter "${e.command}" not found (looked in ${e.binDir} and PATH)`,
		)
		.with(
			{ _tag: "LinterSpawnError" },
			(e) => `Failed to start linter "${e.command}": ${e.detail}`,
		)
		.with(
			{ _tag: "ConfigError" },
			(e) => `Invalid config file ${e.path}: ${e.detail}`,
		)
		.exhaustive();
}

export function reportGateError(error: GateError): void {
	console.error(`❌ ${describeGateError(error)}`);
}

/**
 * Renders how the linter terminated.
 *
 * @pure true
 */
export function describeLinterExit(linter: string, exit: LinterExit): string {
	if (exit.signal !== null) return `${linter} was terminated by ${exit.signal}`;
	return `${linter} exited with status ${String(exit.status)}`;
}

export function reportLinterResult(
	linter: string,
	exit: LinterExit,
	code: ExitCode,
): void {
	if (code === 0) {
		console.log(`✅ ${linter} found no issues`);
		return;
	}
	console.error(`❌ Lint failed: ${describeLinterExit(linter, exit)}`);
}

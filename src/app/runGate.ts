// CHANGE: Application layer orchestration for the lint gate
// WHY: APP composes CORE decisions with SHELL effects and returns an ExitCode value
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: ExitCode ∈ {0,1}; the linter is spawned only after project and environment checks pass
// COMPLEXITY: O(1) besides the linter's own runtime

import { Effect } from "effect";

import { computeExitCode } from "../core/decision.js";
import type { GateError } from "../core/errors.js";
import type { ExitCode, PlatformKind } from "../core/models.js";
import type { CLIOptions, GateOptions } from "../core/types/index.js";
import { checkAndReportPreflight } from "../shell/analysis/index.js";
import { loadGateOptions } from "../shell/config/index.js";
import {
	currentPlatform,
	prepareEnvironment,
	resolveProjectDir,
} from "../shell/environment/index.js";
import {
	formatCommandLine,
	type LinterRunner,
	runLinterProcess,
} from "../shell/linters/index.js";
import {
	reportGateError,
	reportLinterResult,
} from "../shell/output/index.js";

/**
 * Replaceable collaborators of a gate run.
 *
 * @property cwd Directory relative paths are resolved against
 * @property env Base environment the activation starts from
 * @property platform Environment layout family
 * @property runner Process runner used to start the linter
 */
export interface GateDependencies {
	readonly cwd: string;
	readonly env: Readonly<Record<string, string | undefined>>;
	readonly platform: PlatformKind;
	readonly runner: LinterRunner;
}

export const defaultGateDependencies = (): GateDependencies => ({
	cwd: process.cwd(),
	env: process.env,
	platform: currentPlatform(),
	runner: runLinterProcess,
});

/**
 * Resolves the project, activates its environment and runs the linter.
 *
 * @effect Effect<ExitCode, GateError>
 */
function lintInEnvironment(
	options: GateOptions,
	deps: GateDependencies,
): Effect.Effect<ExitCode, GateError> {
	return Effect.gen(function* () {
		const projectDir = yield* resolveProjectDir(deps.cwd, options.projectDir);
		const activated = yield* prepareEnvironment(
			projectDir,
			options.envDir,
			deps.platform,
			deps.env,
		);

		const invocation = {
			command: options.linter,
			args: options.linterArgs,
			cwd: projectDir,
			env: activated.env,
			binDir: activated.binDir,
		};
		console.log(`🔍 Linting directory: ${projectDir}`);
		console.log(`   ↳ Environment: ${activated.envDir}`);
		console.log(`   ↳ Command: ${formatCommandLine(invocation)}`);

		const exit = yield* deps.runner(invocation);
		const code = computeExitCode(exit);
		reportLinterResult(options.linter, exit, code);
		return code;
	});
}

/**
 * Orchestrates a gate run and returns ExitCode as value (no process.exit).
 *
 * @param options - Resolved gate options
 * @param deps - Collaborators; defaults use the real process and filesystem
 * @returns Effect<ExitCode, never>
 *
 * @invariant ExitCode ∈ {0,1}
 * @postcondition linter status = 0 → 0; any failure before or during the run → 1
 */
export function runGate(
	options: GateOptions,
	deps: GateDependencies = defaultGateDependencies(),
): Effect.Effect<ExitCode, never> {
	return Effect.suspend(() => {
		const preflight = checkAndReportPreflight(deps.cwd, options, deps.platform);
		if (!preflight.ok) return Effect.succeed<ExitCode>(1);

		return lintInEnvironment(options, deps).pipe(
			Effect.catchAll((error) =>
				Effect.sync((): ExitCode => {
					reportGateError(error);
					return 1;
				}),
			),
		);
	});
}

/**
 * Loads configuration for parsed CLI options, then runs the gate.
 *
 * @effect Effect<ExitCode, never>
 * @postcondition ConfigError → 1 without running the linter
 */
export function runGateFromCli(
	cli: CLIOptions,
	deps: GateDependencies = defaultGateDependencies(),
): Effect.Effect<ExitCode, never> {
	return loadGateOptions(cli, deps.cwd).pipe(
		Effect.matchEffect({
			onFailure: (error) =>
				Effect.sync((): ExitCode => {
					reportGateError(error);
					return 1;
				}),
			onSuccess: (options) => runGate(options, deps),
		}),
	);
}

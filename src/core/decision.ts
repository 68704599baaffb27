// CHANGE: Pure decision function mapping linter termination to the gate's exit code
// WHY: Centralize termination logic in Functional Core; SHELL only reports and exits
// FORMAT THEOREM: ∀e ∈ LinterExit: e.status = 0 ↔ computeExitCode(e) = 0
// PURITY: CORE
// INVARIANT: No side effects; a non-zero status N is never forwarded as N
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";

import type { ExitCode, LinterExit } from "./models.js";

/**
 * Computes the gate exit code from how the linter terminated.
 *
 * @param exit - Status and signal reported for the child linter
 * @returns 0 when the linter exited with status 0; otherwise 1
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition exit.signal !== null → result = 1
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ status: 0, signal: null }); // 0
 * computeExitCode({ status: 3, signal: null }); // 1
 * computeExitCode({ status: null, signal: "SIGKILL" }); // 1
 * ```
 */
export const computeExitCode = (exit: LinterExit): ExitCode =>
	pipe(
		exit,
		(e) => e.signal === null && e.status === 0,
		(passed): ExitCode => (passed ? 0 : 1),
	);

/**
 * Effect-wrapped variant for composition inside Effect pipelines.
 *
 * @effect Effect<ExitCode, never, never>
 * @complexity O(1)
 */
export const computeExitCodeEffect = (
	exit: LinterExit,
): Effect.Effect<ExitCode> => pipe(exit, computeExitCode, Effect.succeed);

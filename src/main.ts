// CHANGE: Thin APP delegator for programmatic use
// WHY: main parses CLI options and delegates to app/runGate; only bin terminates the process
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runGateFromCli } from "./app/runGate.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param argv Arguments without the node and script entries
 * @returns ExitCode (0 | 1)
 */
export async function main(
	argv: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	const cliOptions = parseCLIArgs(argv);
	return Effect.runPromise(runGateFromCli(cliOptions));
}

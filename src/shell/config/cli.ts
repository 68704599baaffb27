// CHANGE: CLI argument parsing for the gate
// WHY: Flags only override defaults; everything after `--` belongs to the linter
// PURITY: SHELL (reads process.argv when no argument list is given)
// INVARIANT: Unknown flags are ignored; a value flag without a value is ignored
// COMPLEXITY: O(n) where n = |args|

import type { CLIOptions, GateOverrides } from "../../core/types/index.js";

interface ArgState {
	readonly overrides: GateOverrides;
	readonly configPath: string | undefined;
}

interface ArgProcessResult extends ArgState {
	readonly skipNext: boolean;
}

type ValueFlagHandler = (value: string, current: ArgState) => ArgState;

// CHANGE: Lookup table of value flags instead of branching per flag
// WHY: Every value flag has the same shape: consume the next token, set one field
const valueHandlers: Readonly<Partial<Record<string, ValueFlagHandler>>> = {
	"--project": (value, current) => ({
		...current,
		overrides: { ...current.overrides, projectDir: value },
	}),
	"--env": (value, current) => ({
		...current,
		overrides: { ...current.overrides, envDir: value },
	}),
	"--linter": (value, current) => ({
		...current,
		overrides: { ...current.overrides, linter: value },
	}),
	"--config": (value, current) => ({ ...current, configPath: value }),
};

function processArgument(
	arg: string,
	args: readonly string[],
	index: number,
	current: ArgState,
): ArgProcessResult {
	const handler: ValueFlagHandler | undefined = Object.hasOwn(valueHandlers, arg)
		? valueHandlers[arg]
		: undefined;
	if (handler !== undefined) {
		const value = args.at(index + 1);
		if (value === undefined) return { ...current, skipNext: false };
		return { ...handler(value, current), skipNext: true };
	}

	// Positional argument names the project directory, like `lint-gate backend/`;
	// single-dash tokens (`-v`, `-h`) are unknown flags, not directories
	if (!arg.startsWith("-")) {
		return {
			...current,
			overrides: { ...current.overrides, projectDir: arg },
			skipNext: false,
		};
	}

	return { ...current, skipNext: false };
}

/**
 * Parses command line arguments.
 *
 * @param args Arguments without the node and script entries
 * @returns Parsed overrides and the config file path, if given
 *
 * @example
 * ```ts
 * // Command: lint-gate --project backend --env .venv -- --max-line-length 100 src
 * const options = parseCLIArgs();
 * // { overrides: { projectDir: "backend", envDir: ".venv", linterArgs: ["--max-line-length", "100", "src"] } }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	const separator = args.indexOf("--");
	const own = separator === -1 ? args : args.slice(0, separator);

	let state: ArgState = { overrides: {}, configPath: undefined };
	for (let i = 0; i < own.length; i++) {
		const arg: string = own.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, own, i, state);
		state = { overrides: result.overrides, configPath: result.configPath };
		if (result.skipNext) {
			i++;
		}
	}

	const overrides: GateOverrides =
		separator === -1
			? state.overrides
			: { ...state.overrides, linterArgs: args.slice(separator + 1) };

	// exactOptionalPropertyTypes: absence models "configPath?: string"
	return state.configPath === undefined
		? { overrides }
		: { overrides, configPath: state.configPath };
}

// CHANGE: Config file loading and option resolution for the gate
// WHY: Replaces the hard-coded project path and environment name with overridable settings
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<GateOverrides, ConfigError>
// INVARIANT: Precedence is CLI flag > config file > default
// COMPLEXITY: O(n) where n = config file size

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import {
	type CLIOptions,
	DEFAULT_GATE_OPTIONS,
	type GateOptions,
	type GateOverrides,
} from "../../core/types/index.js";

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

function isJSONObject(
	value: JSONValue,
): value is { readonly [key: string]: JSONValue } {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: JSONValue | undefined): value is string {
	return typeof value === "string" && value.length > 0;
}

function isStringArray(
	value: JSONValue | undefined,
): value is ReadonlyArray<string> {
	return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Extracts the known fields from a parsed config object.
 *
 * Invalid or unknown fields are dropped; they never fail the run.
 *
 * @pure true
 */
export function overridesFromJSON(value: JSONValue): GateOverrides {
	if (!isJSONObject(value)) return {};

	const { projectDir, envDir, linter, linterArgs } = value;
	return {
		...(isNonEmptyString(projectDir) ? { projectDir } : {}),
		...(isNonEmptyString(envDir) ? { envDir } : {}),
		...(isNonEmptyString(linter) ? { linter } : {}),
		...(isStringArray(linterArgs) ? { linterArgs } : {}),
	};
}

/**
 * Reads overrides from the JSON config file.
 *
 * @param cwd Directory relative paths are resolved against
 * @param configPath Config file path
 * @returns Overrides; empty when the file does not exist
 *
 * @effect Effect<GateOverrides, ConfigError>
 * @postcondition ¬exists(configPath) → succeed({})
 */
export function loadGateConfig(
	cwd: string,
	configPath: string,
): Effect.Effect<GateOverrides, ConfigError> {
	const file = path.resolve(cwd, configPath);
	if (!fs.existsSync(file)) return Effect.succeed({});

	return Effect.try({
		try: (): GateOverrides => {
			const raw = fs.readFileSync(file, "utf8");
			const parsed: JSONValue = JSON.parse(raw);
			return overridesFromJSON(parsed);
		},
		catch: (error) =>
			new ConfigError({
				path: file,
				detail: error instanceof Error ? error.message : String(error),
			}),
	});
}

/**
 * Merges defaults, config file and CLI overrides.
 *
 * @pure true
 * @postcondition ∀k: result[k] = cli[k] ?? file[k] ?? default[k]
 */
export function resolveGateOptions(
	cli: CLIOptions,
	fileOverrides: GateOverrides,
): GateOptions {
	return {
		...DEFAULT_GATE_OPTIONS,
		...fileOverrides,
		...cli.overrides,
		configPath: cli.configPath ?? DEFAULT_GATE_OPTIONS.configPath,
	};
}

/**
 * Loads the config file named by the CLI (or the default one) and resolves options.
 *
 * @effect Effect<GateOptions, ConfigError>
 */
export function loadGateOptions(
	cli: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<GateOptions, ConfigError> {
	const configPath = cli.configPath ?? DEFAULT_GATE_OPTIONS.configPath;
	return loadGateConfig(cwd, configPath).pipe(
		Effect.map((fileOverrides) => resolveGateOptions(cli, fileOverrides)),
	);
}

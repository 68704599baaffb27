// CHANGE: Configuration types for the lint gate
// WHY: CLI, config file and defaults are merged into one resolved value before any effect runs
// PURITY: CORE

/**
 * Fully resolved run configuration.
 *
 * @property projectDir Directory the linter runs in (relative to cwd unless absolute)
 * @property envDir Dependency environment directory (relative to projectDir unless absolute)
 * @property linter Executable name looked up on the activated PATH
 * @property linterArgs Arguments passed to the linter verbatim
 * @property configPath JSON file the overrides were read from
 */
export interface GateOptions {
	readonly projectDir: string;
	readonly envDir: string;
	readonly linter: string;
	readonly linterArgs: ReadonlyArray<string>;
	readonly configPath: string;
}

/**
 * Overrides accepted from the CLI or the config file; absent fields fall through.
 */
export type GateOverrides = Partial<Omit<GateOptions, "configPath">>;

/**
 * Options parsed from the command line.
 *
 * @invariant configPath is present only when --config was given
 */
export interface CLIOptions {
	readonly overrides: GateOverrides;
	readonly configPath?: string;
}

/**
 * Defaults reproducing `cd <project> && source venv/bin/activate && flake8 .`.
 */
export const DEFAULT_GATE_OPTIONS: GateOptions = {
	projectDir: ".",
	envDir: "venv",
	linter: "flake8",
	linterArgs: ["."],
	configPath: "lint-gate.config.json",
};

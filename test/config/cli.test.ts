// CHANGE: Unit tests for CLI argument parsing
// WHY: Flags and the `--` separator must be parsed deterministically with strict typing

import { describe, expect, it } from "vitest";

import type { CLIOptions } from "../../src/core/types/index.js";
import { parseCLIArgs } from "../../src/shell/config/index.js";

/**
 * Safely set process.argv for the duration of a test and restore afterwards.
 */
function withArgv<T>(args: readonly string[], fn: () => T): T {
	const original = process.argv.slice();
	try {
		process.argv = [original[0] ?? "node", original[1] ?? "script.js", ...args];
		return fn();
	} finally {
		process.argv = original;
	}
}

describe("parseCLIArgs: defaults and positional", () => {
	it("returns no overrides when no args provided", (): void => {
		const opts = withArgv([], () => parseCLIArgs());
		expect(opts).toEqual({ overrides: {} });
	});

	it("parses a positional argument as the project directory", (): void => {
		expect(parseCLIArgs(["backend"]).overrides).toEqual({
			projectDir: "backend",
		});
	});

	it("ignores unknown single-dash flags instead of treating them as a directory", (): void => {
		expect(parseCLIArgs(["-v"]).overrides).toEqual({});
		expect(parseCLIArgs(["-h", "backend"]).overrides).toEqual({
			projectDir: "backend",
		});
	});

	it("ignores empty string arguments and unknown flags", (): void => {
		expect(parseCLIArgs(["", "--verbose", "backend"]).overrides).toEqual({
			projectDir: "backend",
		});
	});
});

describe("parseCLIArgs: value flags", () => {
	it("--project, --env and --linter set overrides", (): void => {
		const opts = parseCLIArgs([
			"--project",
			"weather_backend",
			"--env",
			".venv",
			"--linter",
			"ruff",
		]);
		expect(opts.overrides).toEqual({
			projectDir: "weather_backend",
			envDir: ".venv",
			linter: "ruff",
		});
	});

	it("--config sets configPath outside the overrides", (): void => {
		const opts = parseCLIArgs(["--config", "ci/gate.json"]);
		expect(opts).toEqual({ overrides: {}, configPath: "ci/gate.json" });
	});

	it("value flags skip the next token (do not treat it as positional)", (): void => {
		const opts = parseCLIArgs(["--env", "env2", "backend"]);
		expect(opts.overrides).toEqual({ envDir: "env2", projectDir: "backend" });
	});

	it("ignores a value flag given as the last token", (): void => {
		expect(parseCLIArgs(["--linter"])).toEqual({ overrides: {} });
	});
});

describe("parseCLIArgs: linter arguments", () => {
	it("passes everything after -- to the linter", (): void => {
		const opts: CLIOptions = parseCLIArgs([
			"--project",
			"backend",
			"--",
			"--max-line-length",
			"100",
			"src",
		]);
		expect(opts.overrides).toEqual({
			projectDir: "backend",
			linterArgs: ["--max-line-length", "100", "src"],
		});
	});

	it("an empty tail after -- yields an empty argument list", (): void => {
		expect(parseCLIArgs(["--"]).overrides).toEqual({ linterArgs: [] });
	});
});

describe("parseCLIArgs: prototype keys", () => {
	it("treats Object.prototype names as positional arguments", (): void => {
		expect(parseCLIArgs(["toString"]).overrides).toEqual({
			projectDir: "toString",
		});
	});
});

// CHANGE: Unit tests for preflight checks and messaging
// WHY: Missing project or environment must be caught before the linter is spawned

import * as path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import {
	linterInEnvironment,
	type PreflightIssueCode,
	printPreflightReport,
	runPreflight,
} from "../../src/shell/analysis/index.js";
import { createTempProject, PROJECT_DIR_NAME } from "../utils/tempProject.js";

const options = { projectDir: PROJECT_DIR_NAME, envDir: "venv", linter: "flake8" };
const fakeLinter = { name: "flake8", script: "#!/bin/sh\nexit 0\n" };

describe("preflight: runPreflight scenarios (negative)", () => {
	it("no project directory -> missingProjectDir only, ok=false", (): void => {
		const t = createTempProject();
		try {
			const result = runPreflight(t.cwd, options, "posix");
			expect(result.ok).toBeFalsy();
			expect(result.issues).toEqual<PreflightIssueCode[]>(["missingProjectDir"]);
			expect(result.context.projectDir).toBe(t.projectDir);
		} finally {
			t.cleanup();
		}
	});

	it("project without environment -> missingEnvironment, ok=false", (): void => {
		const t = createTempProject({ withProjectDir: true });
		try {
			const result = runPreflight(t.cwd, options, "posix");
			expect(result.ok).toBeFalsy();
			expect(result.issues).toEqual<PreflightIssueCode[]>(["missingEnvironment"]);
		} finally {
			t.cleanup();
		}
	});

	it("environment without activate script -> missingActivateScript, ok=false", (): void => {
		const t = createTempProject({ withEnvironment: true });
		try {
			const result = runPreflight(t.cwd, options, "posix");
			expect(result.ok).toBeFalsy();
			expect(result.issues).toEqual<PreflightIssueCode[]>([
				"missingActivateScript",
				"linterOutsideEnvironment",
			]);
		} finally {
			t.cleanup();
		}
	});
});

describe("preflight: runPreflight scenarios (positive)", () => {
	it("activatable environment with linter installed -> ok=true, no issues", (): void => {
		const t = createTempProject({ linter: fakeLinter });
		try {
			const result = runPreflight(t.cwd, options, "posix");
			expect(result.ok).toBeTruthy();
			expect(result.issues).toHaveLength(0);
			expect(result.context.binDir).toBe(path.join(t.envDir, "bin"));
		} finally {
			t.cleanup();
		}
	});

	it("linter missing from the environment is advisory only", (): void => {
		const t = createTempProject({ withActivateScript: true });
		try {
			const result = runPreflight(t.cwd, options, "posix");
			expect(result.ok).toBeTruthy();
			expect(result.issues).toEqual<PreflightIssueCode[]>([
				"linterOutsideEnvironment",
			]);
		} finally {
			t.cleanup();
		}
	});
});

describe("linterInEnvironment", () => {
	it("does not look up commands given as a path", (): void => {
		expect(linterInEnvironment("/nowhere/bin", "./tools/lint", "posix")).toBeTruthy();
	});

	it("returns false when the executable is absent", (): void => {
		const t = createTempProject({ withEnvironment: true });
		try {
			expect(
				linterInEnvironment(path.join(t.envDir, "bin"), "flake8", "posix"),
			).toBeFalsy();
		} finally {
			t.cleanup();
		}
	});
});

describe("preflight: printPreflightReport messages", () => {
	const context = {
		projectDir: "/work/backend",
		envDir: "/work/backend/venv",
		binDir: "/work/backend/venv/bin",
		linter: "flake8",
	};

	const setupSpies = () => {
		const err = vi.spyOn(console, "error").mockImplementation(() => {
			// sink
		});
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {
			// sink
		});
		return { err, warn };
	};

	afterEach((): void => {
		vi.restoreAllMocks();
	});

	it("prints guidance for a missing environment on stderr", (): void => {
		const { err, warn } = setupSpies();

		printPreflightReport(["missingEnvironment"], context, "posix");

		expect(err.mock.calls).toEqual([
			["❌ Dependency environment not found: /work/backend/venv"],
			[
				"   Create it with: python -m venv venv && pip install -r requirements.txt",
			],
		]);
		expect(warn).not.toHaveBeenCalled();
	});

	it("prints an advisory for a linter outside the environment", (): void => {
		const { err, warn } = setupSpies();

		printPreflightReport(["linterOutsideEnvironment"], context, "posix");

		expect(warn.mock.calls[0]).toEqual([
			"⚠️  flake8 is not installed in /work/backend/venv/bin; falling back to PATH lookup.",
		]);
		expect(err).not.toHaveBeenCalled();
	});
});

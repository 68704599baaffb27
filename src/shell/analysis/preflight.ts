// CHANGE: Preflight checks for the project directory, the environment and the linter
// WHY: Print actionable English diagnostics before anything is spawned
// PURITY: SHELL (reads the filesystem, writes to console)
// INVARIANT: ok === true iff no blocking issue was found; advisories never block
// COMPLEXITY: O(1) filesystem probes

import * as path from "node:path";
import { match } from "ts-pattern";

import { binDirName, environmentLayout } from "../../core/environment.js";
import type { PlatformKind } from "../../core/models.js";
import type { GateOptions } from "../../core/types/index.js";
import { isDirectory, isFile } from "../environment/index.js";

/**
 * Preflight issue codes.
 *
 * Invariants:
 * - The project directory must exist (blocking).
 * - The environment directory must exist inside it (blocking).
 * - The environment must carry an activation script (blocking).
 * - The linter should be installed inside the environment (advisory: PATH may still find it).
 */
export type PreflightIssueCode =
	| "missingProjectDir"
	| "missingEnvironment"
	| "missingActivateScript"
	| "linterOutsideEnvironment";

/**
 * Absolute locations the checks were made against.
 */
export interface PreflightContext {
	readonly projectDir: string;
	readonly envDir: string;
	readonly binDir: string;
	readonly linter: string;
}

export interface PreflightResult {
	readonly ok: boolean;
	readonly issues: ReadonlyArray<PreflightIssueCode>;
	readonly context: PreflightContext;
}

const BLOCKING: ReadonlySet<PreflightIssueCode> = new Set<PreflightIssueCode>([
	"missingProjectDir",
	"missingEnvironment",
	"missingActivateScript",
]);

export function isBlocking(code: PreflightIssueCode): boolean {
	return BLOCKING.has(code);
}

/**
 * Checks whether the linter executable lives in the environment's bin directory.
 *
 * Commands given as a path (`./tools/lint`, `/usr/bin/flake8`) are not looked up.
 */
export function linterInEnvironment(
	binDir: string,
	linter: string,
	platform: PlatformKind,
): boolean {
	if (linter.includes("/") || linter.includes("\\")) return true;
	const candidates =
		platform === "win32"
			? [`${linter}.exe`, `${linter}.cmd`, `${linter}.bat`, linter]
			: [linter];
	return candidates.some((name) => isFile(path.join(binDir, name)));
}

function pushIssueIf(
	condition: boolean,
	code: PreflightIssueCode,
	out: PreflightIssueCode[],
): void {
	if (condition) {
		out.push(code);
	}
}

/**
 * Run preflight checks and return a structured result.
 *
 * Postconditions:
 * - missingProjectDir → no further checks (nothing else can exist)
 * - missingEnvironment → activation script and linter are not checked
 */
export function runPreflight(
	cwd: string,
	options: Pick<GateOptions, "projectDir" | "envDir" | "linter">,
	platform: PlatformKind,
): PreflightResult {
	const projectDir = path.resolve(cwd, options.projectDir);
	const envDir = path.resolve(projectDir, options.envDir);
	const layout = environmentLayout(envDir, platform);
	const context: PreflightContext = {
		projectDir,
		envDir,
		binDir: layout.binDir,
		linter: options.linter,
	};

	const issues: PreflightIssueCode[] = [];
	if (!isDirectory(projectDir)) {
		issues.push("missingProjectDir");
	} else if (!isDirectory(envDir)) {
		issues.push("missingEnvironment");
	} else {
		pushIssueIf(
			!isFile(layout.activateScript),
			"missingActivateScript",
			issues,
		);
		pushIssueIf(
			!linterInEnvironment(layout.binDir, options.linter, platform),
			"linterOutsideEnvironment",
			issues,
		);
	}

	return { ok: !issues.some(isBlocking), issues, context };
}

/**
 * Print human-readable guidance for detected preflight issues.
 *
 * Blocking issues go to stderr; advisories go to console.warn.
 */
export function printPreflightReport(
	issues: ReadonlyArray<PreflightIssueCode>,
	context: PreflightContext,
	platform: PlatformKind,
): void {
	const activate = path.join(binDirName(platform), "activate");
	for (const code of issues) {
		match(code)
			.with("missingProjectDir", () => {
				console.error(`❌ Project directory not found: ${context.projectDir}`);
				console.error("   Run from the repository root or pass --project <dir>.");
			})
			.with("missingEnvironment", () => {
				console.error(
					`❌ Dependency environment not found: ${context.envDir}`,
				);
				console.error(
					`   Create it with: python -m venv ${path.basename(context.envDir)} && pip install -r requirements.txt`,
				);
			})
			.with("missingActivateScript", () => {
				console.error(
					`❌ ${context.envDir} is not an activatable environment (missing ${activate}).`,
				);
				console.error("   Recreate it or pass --env <dir>.");
			})
			.with("linterOutsideEnvironment", () => {
				console.warn(
					`⚠️  ${context.linter} is not installed in ${context.binDir}; falling back to PATH lookup.`,
				);
				console.warn(`   Install it with: pip install ${context.linter}`);
			})
			.exhaustive();
	}
}

/**
 * Runs preflight and prints the report when anything was found.
 */
export function checkAndReportPreflight(
	cwd: string,
	options: Pick<GateOptions, "projectDir" | "envDir" | "linter">,
	platform: PlatformKind,
): PreflightResult {
	const result = runPreflight(cwd, options, platform);
	if (result.issues.length > 0) {
		printPreflightReport(result.issues, result.context, platform);
	}
	return result;
}

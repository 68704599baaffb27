// CHANGE: Locate and activate the project's dependency environment
// WHY: Equivalent of `cd <project> && source venv/bin/activate` without spawning a shell
// PURITY: SHELL (reads the filesystem and process.env)
// EFFECT: Effect<ActivatedEnvironment, ProjectDirMissing | EnvironmentMissing>
// INVARIANT: Fails before anything is spawned when the project or environment is absent
// COMPLEXITY: O(1) filesystem probes

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";

import { activateEnvironment, environmentLayout } from "../../core/environment.js";
import { EnvironmentMissing, ProjectDirMissing } from "../../core/errors.js";
import type {
	ActivatedEnvironment,
	EnvironmentLayout,
	PlatformKind,
} from "../../core/models.js";

/**
 * Maps the Node platform to the environment layout family.
 */
export function currentPlatform(
	platform: NodeJS.Platform = process.platform,
): PlatformKind {
	return platform === "win32" ? "win32" : "posix";
}

export function isDirectory(target: string): boolean {
	try {
		return fs.statSync(target).isDirectory();
	} catch {
		return false;
	}
}

export function isFile(target: string): boolean {
	try {
		return fs.statSync(target).isFile();
	} catch {
		return false;
	}
}

/**
 * Resolves the project directory against cwd and checks it exists.
 *
 * @effect Effect<string, ProjectDirMissing>
 * @postcondition result is absolute
 */
export function resolveProjectDir(
	cwd: string,
	projectDir: string,
): Effect.Effect<string, ProjectDirMissing> {
	const absolute = path.resolve(cwd, projectDir);
	return isDirectory(absolute)
		? Effect.succeed(absolute)
		: Effect.fail(new ProjectDirMissing({ path: absolute }));
}

/**
 * Resolves the environment directory inside the project and checks its activation script.
 *
 * @param projectDir Absolute project directory
 * @param envDir Environment directory, relative to projectDir unless absolute
 * @effect Effect<EnvironmentLayout, EnvironmentMissing>
 */
export function locateEnvironment(
	projectDir: string,
	envDir: string,
	platform: PlatformKind,
): Effect.Effect<EnvironmentLayout, EnvironmentMissing> {
	const absolute = path.resolve(projectDir, envDir);
	if (!isDirectory(absolute)) {
		return Effect.fail(
			new EnvironmentMissing({ envDir: absolute, reason: "noDirectory" }),
		);
	}
	const layout = environmentLayout(absolute, platform);
	if (!isFile(layout.activateScript)) {
		return Effect.fail(
			new EnvironmentMissing({ envDir: absolute, reason: "noActivateScript" }),
		);
	}
	return Effect.succeed(layout);
}

/**
 * Locates the environment and computes the activated child environment.
 *
 * @effect Effect<ActivatedEnvironment, EnvironmentMissing>
 */
export function prepareEnvironment(
	projectDir: string,
	envDir: string,
	platform: PlatformKind,
	baseEnv: Readonly<Record<string, string | undefined>> = process.env,
): Effect.Effect<ActivatedEnvironment, EnvironmentMissing> {
	return locateEnvironment(projectDir, envDir, platform).pipe(
		Effect.map((layout) => activateEnvironment(baseEnv, layout, platform)),
	);
}

// CHANGE: Pure model of sourcing a virtual environment's activation script
// WHY: Activation only rewrites the child's environment; computing it as data keeps it testable without a shell
// FORMAT THEOREM: ∀base, layout: PATH(activate(base)) = binDir ⧺ sep ⧺ PATH(base)
// PURITY: CORE
// INVARIANT: base environment is never mutated
// COMPLEXITY: O(n) where n = |variables in base environment|

import * as path from "node:path";

import type {
	ActivatedEnvironment,
	EnvironmentLayout,
	PlatformKind,
} from "./models.js";

/**
 * Name of the executables directory inside an environment.
 *
 * @pure true
 */
export function binDirName(platform: PlatformKind): string {
	return platform === "win32" ? "Scripts" : "bin";
}

/**
 * Computes the layout of an environment rooted at `envDir`.
 *
 * @pure true
 * @precondition envDir is absolute
 */
export function environmentLayout(
	envDir: string,
	platform: PlatformKind,
): EnvironmentLayout {
	const binDir = path.join(envDir, binDirName(platform));
	return {
		envDir,
		binDir,
		activateScript: path.join(binDir, "activate"),
	};
}

/**
 * Finds the spelling of the PATH key already present in the environment.
 *
 * Windows environments commonly carry `Path`; keys are case-insensitive there.
 *
 * @pure true
 */
function pathKeyOf(
	env: Readonly<Record<string, string | undefined>>,
	platform: PlatformKind,
): string {
	if (platform !== "win32") return "PATH";
	return Object.keys(env).find((k) => k.toUpperCase() === "PATH") ?? "Path";
}

/**
 * Matches the PYTHONHOME key; Windows keys are case-insensitive.
 *
 * @pure true
 */
function isPythonHomeKey(key: string, platform: PlatformKind): boolean {
	const name = platform === "win32" ? key.toUpperCase() : key;
	return name === "PYTHONHOME";
}

/**
 * Produces the environment a child process sees after activation.
 *
 * @param baseEnv - Environment of the gate process (usually process.env)
 * @param layout - Environment layout resolved by SHELL
 * @param platform - Determines the PATH delimiter and key spelling
 * @returns Activated environment with undefined entries dropped
 *
 * @pure true
 * @postcondition result.env.VIRTUAL_ENV = layout.envDir
 * @postcondition "PYTHONHOME" ∉ keys(result.env)
 * @complexity O(n)
 */
export function activateEnvironment(
	baseEnv: Readonly<Record<string, string | undefined>>,
	layout: EnvironmentLayout,
	platform: PlatformKind,
): ActivatedEnvironment {
	const delimiter = platform === "win32" ? ";" : ":";
	const pathKey = pathKeyOf(baseEnv, platform);

	const env: Record<string, string> = {};
	for (const [key, value] of Object.entries(baseEnv)) {
		if (value === undefined || isPythonHomeKey(key, platform)) continue;
		env[key] = value;
	}

	const currentPath = env[pathKey] ?? "";
	env[pathKey] =
		currentPath.length > 0
			? `${layout.binDir}${delimiter}${currentPath}`
			: layout.binDir;
	env["VIRTUAL_ENV"] = layout.envDir;

	return { envDir: layout.envDir, binDir: layout.binDir, env };
}

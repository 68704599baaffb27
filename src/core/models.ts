// CHANGE: Functional Core domain models for the lint gate (pure, immutable)
// WHY: CORE holds only types and invariants; SHELL produces these values from processes and files
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code of the gate process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * How the child linter terminated.
 *
 * @remarks
 * - `status` is null when the child was killed by a signal
 * - @invariant status === null ↔ signal !== null
 */
export interface LinterExit {
	readonly status: number | null;
	readonly signal: string | null;
}

/**
 * Platforms whose environment layouts differ.
 */
export type PlatformKind = "posix" | "win32";

/**
 * On-disk layout of an isolated dependency environment.
 *
 * @invariant binDir and activateScript are inside envDir
 */
export interface EnvironmentLayout {
	readonly envDir: string;
	readonly binDir: string;
	readonly activateScript: string;
}

/**
 * Child process environment after activation.
 */
export interface ActivatedEnvironment {
	readonly envDir: string;
	readonly binDir: string;
	readonly env: Readonly<Record<string, string>>;
}

// CHANGE: Typed domain error ADT for the gate using Effect.Data
// WHY: Failures are values discriminated by `_tag`; the app boundary collapses them to exit code 1
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Target project directory does not exist or is not a directory.
 *
 * @invariant path is absolute
 */
export class ProjectDirMissing extends Data.TaggedError("ProjectDirMissing")<{
	readonly path: string;
}> {}

/**
 * Dependency environment cannot be activated.
 *
 * @invariant reason = "noDirectory" → envDir does not exist
 */
export class EnvironmentMissing extends Data.TaggedError("EnvironmentMissing")<{
	readonly envDir: string;
	readonly reason: "noDirectory" | "noActivateScript";
}> {}

/**
 * Linter executable could not be found on the activated PATH.
 */
export class LinterNotFound extends Data.TaggedError("LinterNotFound")<{
	readonly command: string;
	readonly binDir: string;
}> {}

/**
 * Linter process could not be started for a reason other than a missing binary.
 *
 * @invariant detail.length > 0
 */
export class LinterSpawnError extends Data.TaggedError("LinterSpawnError")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Configuration file exists but cannot be read or parsed.
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Union of all failures the gate can report.
 *
 * @invariant ∀ e ∈ GateError: exitCode(e) = 1
 */
export type GateError =
	| ProjectDirMissing
	| EnvironmentMissing
	| LinterNotFound
	| LinterSpawnError
	| ConfigError;

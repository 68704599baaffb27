// CHANGE: Run the configured linter as a child process inside the activated environment
// WHY: The linter owns its diagnostics; the gate only needs its termination status
// PURITY: SHELL (spawns a process)
// EFFECT: Effect<LinterExit, LinterNotFound | LinterSpawnError>
// INVARIANT: stdio is inherited, so the linter's output reaches the caller unmodified
// COMPLEXITY: O(1) besides the child's own runtime

import { spawn } from "node:child_process";
import { Effect } from "effect";

import { LinterNotFound, LinterSpawnError } from "../../core/errors.js";
import type { LinterExit } from "../../core/models.js";
import { isDirectory } from "../environment/index.js";

/**
 * Everything needed to start the linter.
 *
 * @invariant cwd is the absolute project directory
 */
export interface LinterInvocation {
	readonly command: string;
	readonly args: ReadonlyArray<string>;
	readonly cwd: string;
	readonly env: Readonly<Record<string, string>>;
	readonly binDir: string;
}

/**
 * Process runner signature; the default spawns a real process.
 */
export type LinterRunner = (
	invocation: LinterInvocation,
) => Effect.Effect<LinterExit, LinterNotFound | LinterSpawnError>;

const quoteArg = (arg: string): string =>
	/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;

/**
 * Renders the invocation as a command line an operator can paste into a shell.
 *
 * @pure true
 */
export function formatCommandLine(
	invocation: Pick<LinterInvocation, "command" | "args">,
): string {
	return [invocation.command, ...invocation.args].map(quoteArg).join(" ");
}

/**
 * Spawns the linter and waits for it to terminate.
 *
 * @pure false - executes external process
 * @effect Effect<LinterExit, LinterNotFound | LinterSpawnError>
 * @postcondition ENOENT on spawn with an existing cwd → LinterNotFound
 */
export const runLinterProcess: LinterRunner = (invocation) =>
	Effect.async<LinterExit, LinterNotFound | LinterSpawnError>((resume) => {
		let settled = false;
		const settle = (
			result: Effect.Effect<LinterExit, LinterNotFound | LinterSpawnError>,
		): void => {
			if (settled) return;
			settled = true;
			resume(result);
		};

		const child = spawn(invocation.command, [...invocation.args], {
			cwd: invocation.cwd,
			env: invocation.env,
			stdio: "inherit",
		});

		child.on("error", (error) => {
			const code = "code" in error ? error.code : undefined;
			// A missing cwd also surfaces as ENOENT on spawn
			if (code === "ENOENT" && !isDirectory(invocation.cwd)) {
				settle(
					Effect.fail(
						new LinterSpawnError({
							command: invocation.command,
							detail: `working directory not found: ${invocation.cwd}`,
						}),
					),
				);
				return;
			}
			if (code === "ENOENT") {
				settle(
					Effect.fail(
						new LinterNotFound({
							command: invocation.command,
							binDir: invocation.binDir,
						}),
					),
				);
				return;
			}
			settle(
				Effect.fail(
					new LinterSpawnError({
						command: invocation.command,
						detail: error.message,
					}),
				),
			);
		});

		child.on("close", (status, signal) => {
			settle(Effect.succeed({ status, signal }));
		});
	});

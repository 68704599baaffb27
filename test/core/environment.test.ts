import * as path from "node:path";
import { describe, expect, it } from "vitest";

import {
	activateEnvironment,
	binDirName,
	environmentLayout,
} from "../../src/core/environment.js";

const envDir = path.join("/", "work", "backend", "venv");

describe("environmentLayout", () => {
	it("uses bin/ on POSIX", () => {
		const layout = environmentLayout(envDir, "posix");
		expect(layout.binDir).toBe(path.join(envDir, "bin"));
		expect(layout.activateScript).toBe(path.join(envDir, "bin", "activate"));
	});

	it("uses Scripts/ on Windows", () => {
		expect(binDirName("win32")).toBe("Scripts");
		expect(environmentLayout(envDir, "win32").binDir).toBe(
			path.join(envDir, "Scripts"),
		);
	});
});

describe("activateEnvironment", () => {
	const layout = environmentLayout(envDir, "posix");

	it("prepends the environment bin directory to PATH", () => {
		const activated = activateEnvironment(
			{ PATH: "/usr/bin:/bin" },
			layout,
			"posix",
		);
		expect(activated.env["PATH"]).toBe(`${layout.binDir}:/usr/bin:/bin`);
	});

	it("sets VIRTUAL_ENV and drops PYTHONHOME", () => {
		const activated = activateEnvironment(
			{ PATH: "/usr/bin", PYTHONHOME: "/opt/python", HOME: "/home/dev" },
			layout,
			"posix",
		);
		expect(activated.env).toEqual({
			PATH: `${layout.binDir}:/usr/bin`,
			VIRTUAL_ENV: envDir,
			HOME: "/home/dev",
		});
	});

	it("uses the bin directory alone when PATH is empty or absent", () => {
		expect(activateEnvironment({}, layout, "posix").env["PATH"]).toBe(
			layout.binDir,
		);
		expect(activateEnvironment({ PATH: "" }, layout, "posix").env["PATH"]).toBe(
			layout.binDir,
		);
	});

	it("drops undefined entries and leaves the base environment untouched", () => {
		const base: Record<string, string | undefined> = {
			PATH: "/usr/bin",
			UNSET: undefined,
		};
		const activated = activateEnvironment(base, layout, "posix");
		expect("UNSET" in activated.env).toBeFalsy();
		expect(base).toEqual({ PATH: "/usr/bin", UNSET: undefined });
	});

	it("keeps the Windows Path spelling and uses ';' as delimiter", () => {
		const winLayout = environmentLayout(envDir, "win32");
		const activated = activateEnvironment(
			{ Path: "C:\\Windows" },
			winLayout,
			"win32",
		);
		expect(activated.env["Path"]).toBe(`${winLayout.binDir};C:\\Windows`);
		expect("PATH" in activated.env).toBeFalsy();
	});

	it("drops PYTHONHOME regardless of key case on Windows", () => {
		const winLayout = environmentLayout(envDir, "win32");
		expect(
			activateEnvironment(
				{ Path: "C:\\Windows", PythonHome: "C:\\Python" },
				winLayout,
				"win32",
			).env,
		).toEqual({
			Path: `${winLayout.binDir};C:\\Windows`,
			VIRTUAL_ENV: envDir,
		});
	});

	it("keeps differently cased PYTHONHOME keys on POSIX", () => {
		expect(
			activateEnvironment({ PythonHome: "/opt/py" }, layout, "posix").env[
				"PythonHome"
			],
		).toBe("/opt/py");
	});

	it("creates a Path entry on Windows when none exists", () => {
		const winLayout = environmentLayout(envDir, "win32");
		expect(activateEnvironment({}, winLayout, "win32").env).toEqual({
			Path: winLayout.binDir,
			VIRTUAL_ENV: envDir,
		});
	});
});

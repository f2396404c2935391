import fs from "fs-extra";
import { debug } from "../utils/debug.js";
import { detectDialect, resolveShell } from "./dialect.js";
import { integrationPaths } from "./install.js";
import { HANDOFF_VARIABLE } from "./script-helpers.js";

export interface ShellLaunchOptions {
	shell?: string;
	integrationDir: string;
	env?: NodeJS.ProcessEnv;
	exists?: (filePath: string) => boolean;
}

export interface ShellLaunch {
	command: string;
	args: string[];
	/** Variables to set on top of the parent environment. */
	env: Record<string, string>;
	integrated: boolean;
}

/**
 * How to start a shell so the integration scripts load. The parent's
 * environment is only read, never modified.
 */
export function buildShellLaunch(options: ShellLaunchOptions): ShellLaunch {
	const parentEnv = options.env ?? process.env;
	const exists = options.exists ?? ((filePath: string) => fs.existsSync(filePath));
	const command = options.shell ?? resolveShell(parentEnv);
	const paths = integrationPaths(options.integrationDir);

	const launch: ShellLaunch = {
		command,
		args: [],
		env: {
			TERM: "xterm-256color",
			COLORTERM: "truecolor",
		},
		integrated: false,
	};

	const dialect = detectDialect(command);
	if (dialect === "zsh" && exists(paths.zdotdir)) {
		const original = parentEnv.ZDOTDIR;
		if (original) {
			launch.env[HANDOFF_VARIABLE] = original;
		}
		launch.env.ZDOTDIR = paths.zdotdir;
		launch.integrated = true;
	} else if (dialect === "bash" && exists(paths.bash)) {
		launch.args = ["--rcfile", paths.bash, "-i"];
		launch.integrated = true;
	} else {
		debug.log("integration", `No integration available for ${command}`);
	}

	return launch;
}

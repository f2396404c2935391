import { Command } from "commander";
import { loadConfig } from "../config/loader.js";
import type { ShellmarkConfig } from "../config/schema.js";
import { isStdinInteractive } from "../terminal/capabilities.js";
import { debug } from "../utils/debug.js";
import { handleError, setupErrorHandlers } from "../utils/errors.js";
import { consola, setDebugMode } from "../utils/logger.js";
import { runConfigCommand } from "./commands/config.js";
import { runEmitCommand } from "./commands/emit.js";
import { runEnvCommand } from "./commands/env.js";
import { runInitCommand } from "./commands/init.js";
import { runScriptCommand } from "./commands/script.js";
import { runWatchCommand } from "./commands/watch.js";
import { type CommandIO, processIO } from "./types.js";

export const VERSION = "0.3.0";

interface GlobalOptions {
	debug?: boolean;
}

export function createProgram(io: CommandIO = processIO): Command {
	const program = new Command();

	program
		.name("shellmark")
		.description("Prompt and command-state markers for zsh and bash")
		.version(VERSION, "-v, --version")
		.option("-d, --debug", "Debug mode", false)
		.hook("preAction", (thisCommand) => {
			const opts = thisCommand.opts<GlobalOptions>();
			if (opts.debug || process.env.SHELLMARK_DEBUG === "true") {
				setDebugMode(true);
				debug.enable();
			}
			setupErrorHandlers(opts.debug ?? false);
		});

	const loadCommandConfig = async (): Promise<ShellmarkConfig> => {
		const config = await loadConfig();
		if (config.debug && !debug.isEnabled()) {
			setDebugMode(true);
			debug.enable();
		}
		return config;
	};

	const withErrors =
		<A extends unknown[]>(action: (...args: A) => void | Promise<void>) =>
		async (...args: A): Promise<void> => {
			try {
				await action(...args);
			} catch (error) {
				handleError(error, debug.isEnabled());
			}
		};

	program
		.command("init")
		.description("Write the integration scripts")
		.argument("[dir]", "Target directory (defaults to the configured one)")
		.option("--theme <file>", "File sourced after the user's rc files")
		.action(
			withErrors(async (dir: string | undefined, opts: { theme?: string }) => {
				const config = await loadCommandConfig();
				await runInitCommand(config, { dir, themeFile: opts.theme });
			}),
		);

	program
		.command("script")
		.description("Print a generated script (zshrc, zshenv, bash)")
		.argument("<name>", "Script name")
		.action(
			withErrors(async (name: string) => {
				const config = await loadCommandConfig();
				runScriptCommand(name, config, io);
			}),
		);

	program
		.command("emit")
		.description("Write one marker to stdout")
		.argument("<kind>", "prompt | start | finish (or A, B, D)")
		.argument("[exitCode]", "Exit code for the finish marker")
		.action(
			withErrors(async (kind: string, exitCode: string | undefined) => {
				const config = await loadCommandConfig();
				runEmitCommand(kind, exitCode, config, io);
			}),
		);

	program
		.command("env")
		.description("Show the environment that launches a shell with integration")
		.argument("[shell]", "Shell executable (defaults to $SHELL)")
		.option("-j, --json", "Output as JSON", false)
		.action(
			withErrors(async (shell: string | undefined, opts: { json: boolean }) => {
				const config = await loadCommandConfig();
				runEnvCommand(config, { shell, json: opts.json }, io);
			}),
		);

	program
		.command("watch")
		.description("Track command state from terminal output on stdin")
		.option("-p, --passthrough", "Copy input to stdout", false)
		.action(
			withErrors(async (opts: { passthrough: boolean }) => {
				const config = await loadCommandConfig();
				if (isStdinInteractive()) {
					consola.warn(
						"Reading from the terminal; pipe a session's output into `shellmark watch`",
					);
				}
				const state = await runWatchCommand(
					process.stdin,
					config,
					{ passthrough: opts.passthrough },
					io,
				);
				if (state === "failure") {
					process.exitCode = 1;
				}
			}),
		);

	program
		.command("config")
		.description("Show current config")
		.option("-j, --json", "Output as JSON", false)
		.action(
			withErrors(async (opts: { json: boolean }) => {
				const config = await loadCommandConfig();
				runConfigCommand(config, { json: opts.json }, io);
			}),
		);

	return program;
}

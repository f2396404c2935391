import { debug } from "../utils/debug.js";
import { LifecycleError, MarkerError } from "../utils/errors.js";
import { HookRegistry } from "./hook-registry.js";

export type LifecyclePhase = "between-commands" | "command-running";

export type CommandExecutor = (
	commandLine: string,
) => number | void | Promise<number | void>;

const log = debug.category("lifecycle");

function toExitCode(result: number | void): number {
	if (typeof result !== "number") {
		return 0;
	}
	if (!Number.isSafeInteger(result)) {
		throw new MarkerError(`Invalid exit code "${result}"`, String(result));
	}
	return result;
}

/**
 * One interactive shell's read-eval-print cycle, as seen by its hooks.
 * Commands run one at a time; the exit status is captured before any
 * post-command hook runs.
 */
export class ShellLifecycle {
	readonly hooks: HookRegistry;
	private currentPhase: LifecyclePhase = "between-commands";
	private exitCode: number | undefined;

	constructor(hooks: HookRegistry = new HookRegistry()) {
		this.hooks = hooks;
	}

	get phase(): LifecyclePhase {
		return this.currentPhase;
	}

	get lastExitCode(): number | undefined {
		return this.exitCode;
	}

	async runCommand(
		commandLine: string,
		execute: CommandExecutor,
	): Promise<number> {
		if (this.currentPhase === "command-running") {
			throw new LifecycleError(
				`Cannot run "${commandLine}" while another command is running`,
			);
		}

		this.hooks.dispatch("preexec", { commandLine });
		this.currentPhase = "command-running";

		let status: number;
		try {
			status = toExitCode(await execute(commandLine));
		} catch (error) {
			const errorMsg = error instanceof Error ? error.message : String(error);
			log.log(`Command "${commandLine}" threw: ${errorMsg}`);
			status = 1;
		}
		this.exitCode = status;
		this.currentPhase = "between-commands";

		this.hooks.dispatch("precmd", { exitCode: status });
		return status;
	}
}

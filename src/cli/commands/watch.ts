import type { Readable } from "node:stream";
import type { ShellmarkConfig } from "../../config/schema.js";
import {
	type CommandState,
	SessionMonitor,
} from "../../session/command-state.js";
import { formatState, formatStateChange } from "../../terminal/output.js";
import { consola } from "../../utils/logger.js";
import type { CommandIO, WatchOptions } from "../types.js";

/**
 * Reads terminal output, logs each command-state change and resolves with
 * the final state once the input ends. With `passthrough` the input bytes
 * are copied to stdout unchanged.
 */
export function runWatchCommand(
	input: Readable,
	config: ShellmarkConfig,
	options: WatchOptions,
	io: CommandIO,
): Promise<CommandState> {
	const monitor = new SessionMonitor({ tailLimit: config.scannerTailLimit });
	const unsubscribe = monitor.tracker.onChange((change) => {
		consola.info(formatStateChange(change));
	});

	return new Promise((resolve, reject) => {
		input.on("data", (chunk: string | Buffer) => {
			monitor.write(chunk);
			if (options.passthrough) {
				io.stdout.write(chunk);
			}
		});

		input.on("end", () => {
			unsubscribe();
			monitor.scanner.flush();
			const { current, lastExitCode } = monitor.tracker;
			consola.info(`Final state: ${formatState(current, lastExitCode)}`);
			resolve(current);
		});

		input.on("error", (error) => {
			unsubscribe();
			reject(error);
		});
	});
}

import {
	type Terminator,
	commandFinished,
	commandStart,
	describeMarker,
	promptReady,
} from "../markers/protocol.js";
import { debug } from "../utils/debug.js";
import type { HookHandle, HookRegistry } from "./hook-registry.js";

export interface MarkerSink {
	write(chunk: string): unknown;
}

export interface SessionStateReporterOptions {
	output: MarkerSink;
	terminator?: Terminator;
}

export const PREEXEC_HOOK_ID = "shellmark:preexec";
export const PRECMD_HOOK_ID = "shellmark:precmd";

const log = debug.category("reporter");

/**
 * Emits command-start before a command line runs, and command-finished
 * followed by prompt-ready once it completes.
 */
export class SessionStateReporter {
	private readonly output: MarkerSink;
	private readonly terminator: Terminator;
	private handles: HookHandle[] = [];

	constructor(options: SessionStateReporterOptions) {
		this.output = options.output;
		this.terminator = options.terminator ?? "bel";
	}

	onPreExec(): void {
		this.emit(commandStart(this.terminator));
	}

	onPostCommand(exitCode: number): void {
		this.emit(commandFinished(exitCode, this.terminator));
		this.emit(promptReady(this.terminator));
	}

	/**
	 * Registers both hooks unless they are already present. Only hooks this
	 * reporter registered are tracked, so `uninstall` never removes another
	 * reporter's hooks.
	 */
	install(registry: HookRegistry): void {
		if (!registry.has("preexec", PREEXEC_HOOK_ID)) {
			this.handles.push(
				registry.register("preexec", PREEXEC_HOOK_ID, () => this.onPreExec()),
			);
		}
		if (!registry.has("precmd", PRECMD_HOOK_ID)) {
			this.handles.push(
				registry.register("precmd", PRECMD_HOOK_ID, ({ exitCode }) =>
					this.onPostCommand(exitCode),
				),
			);
		}
	}

	uninstall(): void {
		for (const handle of this.handles) {
			handle.dispose();
		}
		this.handles = [];
	}

	get installed(): boolean {
		return this.handles.length > 0;
	}

	private emit(sequence: string): void {
		try {
			this.output.write(sequence);
			log.log(`Emitted ${describeMarker(sequence)}`);
		} catch (error) {
			const errorMsg = error instanceof Error ? error.message : String(error);
			log.log(`Failed to emit ${describeMarker(sequence)}: ${errorMsg}`);
		}
	}
}

import type { Marker } from "../markers/protocol.js";
import { MarkerScanner, type MarkerScannerOptions } from "../markers/scanner.js";
import { debug } from "../utils/debug.js";

export type CommandState = "idle" | "running" | "success" | "failure";

export interface CommandStateChange {
	previous: CommandState;
	current: CommandState;
	exitCode?: number;
}

export type CommandStateListener = (change: CommandStateChange) => void;

const log = debug.category("state");

/**
 * Host-side view of a shell session, driven by the markers the shell emits.
 *
 * Success and failure are sticky: a prompt-ready marker only returns to
 * idle from running, so the last result stays visible until the next
 * command starts.
 */
export class CommandStateTracker {
	private state: CommandState = "idle";
	private exitCode: number | undefined;
	private listeners = new Set<CommandStateListener>();

	get current(): CommandState {
		return this.state;
	}

	get lastExitCode(): number | undefined {
		return this.exitCode;
	}

	apply(marker: Marker): CommandState {
		switch (marker.kind) {
			case "A":
				if (this.state === "running") {
					this.transition("idle");
				}
				break;
			case "B":
				this.transition("running");
				break;
			case "C":
				break;
			case "D":
				this.exitCode = marker.exitCode;
				if (marker.exitCode === undefined || marker.exitCode === 0) {
					this.transition("success");
				} else {
					this.transition("failure");
				}
				break;
		}
		return this.state;
	}

	/** Input containing a line break was forwarded to the shell. */
	markInputSubmitted(input: string | Uint8Array): void {
		const hasNewline =
			typeof input === "string"
				? /[\r\n]/.test(input)
				: input.includes(0x0d) || input.includes(0x0a);
		if (hasNewline) {
			this.transition("running");
		}
	}

	onChange(listener: CommandStateListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	reset(): void {
		this.exitCode = undefined;
		this.transition("idle");
	}

	private transition(next: CommandState): void {
		const previous = this.state;
		this.state = next;
		if (previous === next) {
			return;
		}
		log.log(`${previous} -> ${next}`);
		const change: CommandStateChange = {
			previous,
			current: next,
			exitCode:
				next === "success" || next === "failure" ? this.exitCode : undefined,
		};
		for (const listener of this.listeners) {
			listener(change);
		}
	}
}

/** Couples a scanner and a tracker for a single output stream. */
export class SessionMonitor {
	readonly scanner: MarkerScanner;
	readonly tracker: CommandStateTracker;

	constructor(options: MarkerScannerOptions = {}) {
		this.scanner = new MarkerScanner(options);
		this.tracker = new CommandStateTracker();
	}

	write(chunk: string | Uint8Array): CommandState {
		for (const { marker } of this.scanner.feed(chunk)) {
			this.tracker.apply(marker);
		}
		return this.tracker.current;
	}
}

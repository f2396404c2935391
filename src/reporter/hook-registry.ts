import { debug } from "../utils/debug.js";

export type HookEvent = "preexec" | "precmd";

export interface PreExecPayload {
	commandLine: string;
}

export interface PreCmdPayload {
	exitCode: number;
}

export interface HookPayloads {
	preexec: PreExecPayload;
	precmd: PreCmdPayload;
}

export type HookCallback<E extends HookEvent> = (
	payload: HookPayloads[E],
) => void;

export interface HookHandle {
	readonly event: HookEvent;
	readonly id: string;
	dispose(): void;
}

interface HookEntry<E extends HookEvent> {
	id: string;
	callback: HookCallback<E>;
	handle: HookHandle;
}

type HookTable = { [E in HookEvent]: HookEntry<E>[] };

const log = debug.category("hooks");

/**
 * Ordered callback lists for the shell lifecycle points. Registration is
 * keyed by id, so registering an id twice keeps the first callback.
 */
export class HookRegistry {
	private hooks: HookTable = { preexec: [], precmd: [] };

	register<E extends HookEvent>(
		event: E,
		id: string,
		callback: HookCallback<E>,
	): HookHandle {
		const entries: HookEntry<E>[] = this.hooks[event];
		const existing = entries.find((entry) => entry.id === id);
		if (existing) {
			log.log(`Hook ${id} already registered for ${event}`);
			return existing.handle;
		}

		const handle: HookHandle = {
			event,
			id,
			dispose: () => {
				this.unregister(event, id);
			},
		};
		entries.push({ id, callback, handle });
		log.log(`Registered ${event} hook ${id}`);
		return handle;
	}

	unregister<E extends HookEvent>(event: E, id: string): boolean {
		const entries: HookEntry<E>[] = this.hooks[event];
		const index = entries.findIndex((entry) => entry.id === id);
		if (index === -1) {
			return false;
		}
		entries.splice(index, 1);
		return true;
	}

	has<E extends HookEvent>(event: E, id: string): boolean {
		const entries: HookEntry<E>[] = this.hooks[event];
		return entries.some((entry) => entry.id === id);
	}

	size(event: HookEvent): number {
		return this.hooks[event].length;
	}

	ids<E extends HookEvent>(event: E): string[] {
		const entries: HookEntry<E>[] = this.hooks[event];
		return entries.map((entry) => entry.id);
	}

	/**
	 * Runs every callback for `event` in registration order. A failing
	 * callback is logged and the rest still run.
	 */
	dispatch<E extends HookEvent>(event: E, payload: HookPayloads[E]): void {
		const entries: HookEntry<E>[] = [...this.hooks[event]];
		for (const entry of entries) {
			try {
				entry.callback(payload);
			} catch (error) {
				const errorMsg = error instanceof Error ? error.message : String(error);
				log.log(`Hook ${entry.id} failed on ${event}: ${errorMsg}`);
			}
		}
	}

	clear(): void {
		this.hooks = { preexec: [], precmd: [] };
	}
}

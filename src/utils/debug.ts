import { consola } from "./logger.js";

const DEBUG_NAMESPACE = "shellmark";

export type DebugCategory =
	| "config"
	| "hooks"
	| "reporter"
	| "lifecycle"
	| "scanner"
	| "state"
	| "integration"
	| "cli";

export interface CategoryLogger {
	log: (message: string, ...args: unknown[]) => void;
}

class Debugger {
	private enabled: boolean;
	private namespace: string;

	constructor(namespace: string = DEBUG_NAMESPACE) {
		this.namespace = namespace;
		this.enabled = process.env.SHELLMARK_DEBUG === "true";
	}

	enable(): void {
		this.enabled = true;
	}

	disable(): void {
		this.enabled = false;
	}

	isEnabled(): boolean {
		return this.enabled;
	}

	log(category: DebugCategory, message: string, ...args: unknown[]): void {
		if (!this.enabled) return;

		const timestamp = new Date().toISOString().split("T")[1].slice(0, 12);
		const prefix = `[${timestamp}] [${this.namespace}:${category}]`;

		consola.debug(prefix, message, ...args);
	}

	category(name: DebugCategory): CategoryLogger {
		return {
			log: (message: string, ...args: unknown[]) =>
				this.log(name, message, ...args),
		};
	}
}

export const debug = new Debugger();

export default debug;

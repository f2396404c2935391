import cleanStack from "clean-stack";
import pc from "picocolors";
import { serializeError } from "serialize-error";
import { consola } from "./logger.js";

export class ShellmarkError extends Error {
	constructor(
		message: string,
		public code: string = "SHELLMARK_ERROR",
		public exitCode: number = 1,
		public showStack: boolean = false,
	) {
		super(message);
		this.name = "ShellmarkError";
	}
}

export class ConfigError extends ShellmarkError {
	constructor(message: string) {
		super(message, "CONFIG_ERROR", 2, false);
		this.name = "ConfigError";
	}
}

export class MarkerError extends ShellmarkError {
	constructor(
		message: string,
		public input?: string,
	) {
		super(message, "MARKER_ERROR", 3, false);
		this.name = "MarkerError";
	}
}

export enum IntegrationErrorCode {
	WRITE_FAILED = "INTEGRATION_WRITE_FAILED",
	UNKNOWN_SCRIPT = "INTEGRATION_UNKNOWN_SCRIPT",
}

export class IntegrationError extends ShellmarkError {
	constructor(
		message: string,
		public code: IntegrationErrorCode = IntegrationErrorCode.WRITE_FAILED,
		public path?: string,
	) {
		super(message, code, 4, false);
		this.name = "IntegrationError";
	}
}

export class LifecycleError extends ShellmarkError {
	constructor(message: string) {
		super(message, "LIFECYCLE_ERROR", 5, false);
		this.name = "LifecycleError";
	}
}

export function formatError(error: unknown, showStack = false): string {
	const prefix = pc.red("✖");

	if (error instanceof ShellmarkError) {
		const parts = [`${prefix} ${error.name}: ${error.message}`];
		if ((showStack || error.showStack) && error.stack) {
			parts.push(`\n${cleanStack(error.stack, { pretty: true })}`);
		}
		return parts.join("\n");
	}

	if (error instanceof Error) {
		const parts = [`${prefix} ${error.message}`];
		if (showStack && error.stack) {
			parts.push(`\n${cleanStack(error.stack, { pretty: true })}`);
		}
		return parts.join("\n");
	}

	return `${prefix} ${String(error)}`;
}

export function handleError(error: unknown, debug = false): never {
	consola.error(formatError(error, debug));
	if (debug) {
		consola.debug(JSON.stringify(toJSON(error), null, 2));
	}

	if (error instanceof ShellmarkError) {
		process.exit(error.exitCode);
	}

	process.exit(1);
}

export function toJSON(error: unknown): Record<string, unknown> {
	const serialized = serializeError(error);
	if (typeof serialized === "object" && serialized !== null) {
		return { ...serialized };
	}
	return { error: String(error) };
}

let handlersSetup = false;

export function setupErrorHandlers(debug = false): void {
	if (handlersSetup) {
		return;
	}
	handlersSetup = true;

	process.on("uncaughtException", (error) => {
		consola.error(formatError(error, debug));
		process.exit(1);
	});

	process.on("unhandledRejection", (reason) => {
		const error = reason instanceof Error ? reason : new Error(String(reason));
		consola.error(formatError(error, debug));
		process.exit(1);
	});

	process.on("SIGINT", () => {
		process.exit(130);
	});

	process.on("SIGTERM", () => {
		process.exit(143);
	});
}

import isCI from "is-ci";
import isUnicodeSupported from "is-unicode-supported";
import supportsColor from "supports-color";

export interface TerminalCapabilities {
	colors: boolean;
	unicode: boolean;
	ci: boolean;
	stdinTty: boolean;
}

export function detectTerminalCapabilities(): TerminalCapabilities {
	return {
		colors: supportsColor.stderr !== false,
		unicode: isUnicodeSupported(),
		ci: isCI,
		stdinTty: process.stdin.isTTY ?? false,
	};
}

let cachedCapabilities: TerminalCapabilities | null = null;

export function getCapabilities(): TerminalCapabilities {
	if (!cachedCapabilities) {
		cachedCapabilities = detectTerminalCapabilities();
	}
	return cachedCapabilities;
}

export function shouldUseColors(): boolean {
	const caps = getCapabilities();
	return caps.colors && !caps.ci;
}

export function shouldUseUnicode(): boolean {
	return getCapabilities().unicode;
}

/** Whether stdin is a terminal rather than a pipe. */
export function isStdinInteractive(): boolean {
	return getCapabilities().stdinTty;
}

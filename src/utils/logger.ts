import { createConsola } from "consola";
import isInteractive from "is-interactive";
import supportsColor from "supports-color";

const isInteractiveTerminal = isInteractive({ stream: process.stderr });
const colorSupport = supportsColor.stderr;
const colorLevel =
	typeof colorSupport === "object" && colorSupport !== null
		? colorSupport.level
		: 0;

export const consola = createConsola({
	level: process.env.SHELLMARK_DEBUG === "true" ? 5 : 3,
	stdout: process.stderr,
	stderr: process.stderr,
	formatOptions: {
		colors: colorLevel > 0,
		compact: !isInteractiveTerminal,
		date: false,
	},
});

export function setDebugMode(enabled: boolean): void {
	consola.level = enabled ? 5 : 3;
}

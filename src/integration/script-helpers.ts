import {
	BEL,
	ESC,
	OSC_PREFIX,
	type Terminator,
	terminatorBytes,
} from "../markers/protocol.js";

export const HANDOFF_VARIABLE = "SHELLMARK_ORIG_ZDOTDIR";

export function generatedHeader(description: string): string {
	return `# shellmark ${description} (generated by shellmark, do not edit)`;
}

// Single-quote a value for POSIX shells.
export function quoteShellArg(arg: string): string {
	return `'${arg.replace(/'/g, "'\\''")}'`;
}

/** Renders an escape sequence as a printf format string. */
export function toPrintfFormat(sequence: string): string {
	let format = "";
	for (const ch of sequence) {
		if (ch === ESC) format += "\\033";
		else if (ch === BEL) format += "\\007";
		else if (ch === "\\") format += "\\\\";
		else if (ch === "%") format += "%%";
		else format += ch;
	}
	return format;
}

export interface MarkerFormats {
	promptReady: string;
	commandStart: string;
	/** Takes the exit code as its one `%d` argument. */
	commandFinished: string;
}

export function markerFormats(terminator: Terminator = "bel"): MarkerFormats {
	const end = toPrintfFormat(terminatorBytes(terminator));
	const prefix = toPrintfFormat(OSC_PREFIX);
	return {
		promptReady: `${prefix}A${end}`,
		commandStart: `${prefix}B${end}`,
		commandFinished: `${prefix}D;%d${end}`,
	};
}

export function sourceIfExists(filePath: string): string {
	const quoted = quoteShellArg(filePath);
	return `[[ -f ${quoted} ]] && source ${quoted}`;
}

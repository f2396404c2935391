import { MarkerError } from "../utils/errors.js";

export const ESC = "\x1b";
export const BEL = "\x07";
export const ST = `${ESC}\\`;

/** Numeric OSC namespace used for prompt and command-state reporting. */
export const OSC_NAMESPACE = "133";
export const OSC_PREFIX = `${ESC}]${OSC_NAMESPACE};`;

export type MarkerKind = "A" | "B" | "C" | "D";

export type Terminator = "bel" | "st";

export type Marker =
	| { kind: "A" }
	| { kind: "B" }
	| { kind: "C" }
	| { kind: "D"; exitCode?: number };

export const MARKER_KINDS: readonly MarkerKind[] = ["A", "B", "C", "D"];

const KIND_ALIASES: Record<string, MarkerKind> = {
	a: "A",
	prompt: "A",
	"prompt-ready": "A",
	b: "B",
	start: "B",
	"command-start": "B",
	c: "C",
	output: "C",
	d: "D",
	finish: "D",
	finished: "D",
	"command-finished": "D",
};

export function isMarkerKind(value: string): value is MarkerKind {
	return (MARKER_KINDS as readonly string[]).includes(value);
}

export function parseMarkerKind(value: string): MarkerKind {
	const kind = KIND_ALIASES[value.trim().toLowerCase()];
	if (!kind) {
		throw new MarkerError(
			`Unknown marker kind "${value}". Expected one of: ${Object.keys(KIND_ALIASES).join(", ")}`,
			value,
		);
	}
	return kind;
}

export function terminatorBytes(terminator: Terminator = "bel"): string {
	return terminator === "st" ? ST : BEL;
}

export function formatExitCode(exitCode: number): string {
	if (!Number.isSafeInteger(exitCode)) {
		throw new MarkerError(
			`Exit code must be an integer, got ${String(exitCode)}`,
			String(exitCode),
		);
	}
	return exitCode.toString(10);
}

export function parseExitCode(value: string): number {
	const trimmed = value.trim();
	if (!/^-?\d+$/.test(trimmed)) {
		throw new MarkerError(`Invalid exit code "${value}"`, value);
	}
	return Number.parseInt(trimmed, 10);
}

export function encodeMarker(
	marker: Marker,
	terminator: Terminator = "bel",
): string {
	let body: string = marker.kind;
	if (marker.kind === "D" && marker.exitCode !== undefined) {
		body += `;${formatExitCode(marker.exitCode)}`;
	}
	return `${OSC_PREFIX}${body}${terminatorBytes(terminator)}`;
}

export function promptReady(terminator: Terminator = "bel"): string {
	return encodeMarker({ kind: "A" }, terminator);
}

export function commandStart(terminator: Terminator = "bel"): string {
	return encodeMarker({ kind: "B" }, terminator);
}

export function commandFinished(
	exitCode: number,
	terminator: Terminator = "bel",
): string {
	return encodeMarker({ kind: "D", exitCode }, terminator);
}

/** Escapes control bytes so a marker can be shown in logs. */
export function describeMarker(sequence: string): string {
	return sequence
		.replaceAll(ESC, "ESC")
		.replaceAll(BEL, "BEL")
		.replace(/ESC\\$/, "ST");
}

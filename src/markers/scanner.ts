import { debug } from "../utils/debug.js";
import {
	BEL,
	ESC,
	type Marker,
	OSC_PREFIX,
	type Terminator,
	isMarkerKind,
} from "./protocol.js";

export interface ScannedMarker {
	marker: Marker;
	terminator: Terminator;
	raw: string;
}

export interface MarkerScannerOptions {
	/** Longest incomplete sequence held back between chunks. */
	tailLimit?: number;
}

export const DEFAULT_TAIL_LIMIT = 64;

const log = debug.category("scanner");

function parseBody(body: string): Marker | null {
	const kind = body.charAt(0);
	if (!isMarkerKind(kind)) {
		return null;
	}
	if (kind !== "D") {
		return { kind };
	}

	const params = body.slice(1);
	if (!params.startsWith(";")) {
		return { kind: "D" };
	}
	const code = params.slice(1).split(";")[0];
	if (!/^-?\d+$/.test(code)) {
		return { kind: "D" };
	}
	return { kind: "D", exitCode: Number.parseInt(code, 10) };
}

// Length of the longest suffix of `text` that is a proper prefix of OSC_PREFIX.
function partialPrefixLength(text: string): number {
	const max = Math.min(text.length, OSC_PREFIX.length - 1);
	for (let len = max; len > 0; len--) {
		if (OSC_PREFIX.startsWith(text.slice(text.length - len))) {
			return len;
		}
	}
	return 0;
}

/**
 * Finds prompt/command-state markers in terminal output. Sequences split
 * across chunks are completed on a later `feed` and reported once.
 */
export class MarkerScanner {
	private pending = "";
	private readonly tailLimit: number;
	private readonly decoder = new TextDecoder("utf-8");

	constructor(options: MarkerScannerOptions = {}) {
		this.tailLimit = options.tailLimit ?? DEFAULT_TAIL_LIMIT;
	}

	feed(chunk: string | Uint8Array): ScannedMarker[] {
		const text =
			typeof chunk === "string"
				? chunk
				: this.decoder.decode(chunk, { stream: true });
		const buffer = this.pending + text;
		this.pending = "";

		const found: ScannedMarker[] = [];
		let pos = 0;

		while (pos < buffer.length) {
			const start = buffer.indexOf(OSC_PREFIX, pos);
			if (start === -1) {
				const keep = partialPrefixLength(buffer.slice(pos));
				this.pending = keep > 0 ? buffer.slice(buffer.length - keep) : "";
				break;
			}

			const bodyStart = start + OSC_PREFIX.length;
			const end = this.findTerminator(buffer, bodyStart);

			if (end.type === "incomplete") {
				const tail = buffer.slice(start);
				if (tail.length > this.tailLimit) {
					log.log(`Dropping unterminated sequence (${tail.length} chars)`);
				} else {
					this.pending = tail;
				}
				break;
			}

			if (end.type === "aborted") {
				pos = end.index;
				continue;
			}

			const body = buffer.slice(bodyStart, end.index);
			const marker = parseBody(body);
			const next = end.index + (end.terminator === "st" ? 2 : 1);
			if (marker) {
				log.log(`Detected marker ${marker.kind}`);
				found.push({
					marker,
					terminator: end.terminator,
					raw: buffer.slice(start, next),
				});
			}
			pos = next;
		}

		return found;
	}

	/** Discards any held-back partial sequence. */
	flush(): void {
		this.pending = "";
		this.decoder.decode();
	}

	get pendingLength(): number {
		return this.pending.length;
	}

	private findTerminator(
		buffer: string,
		from: number,
	):
		| { type: "complete"; index: number; terminator: Terminator }
		| { type: "aborted"; index: number }
		| { type: "incomplete" } {
		for (let i = from; i < buffer.length; i++) {
			const ch = buffer[i];
			if (ch === BEL) {
				return { type: "complete", index: i, terminator: "bel" };
			}
			if (ch === ESC) {
				if (i + 1 >= buffer.length) {
					return { type: "incomplete" };
				}
				if (buffer[i + 1] === "\\") {
					return { type: "complete", index: i, terminator: "st" };
				}
				// Another escape sequence began before this one was terminated.
				return { type: "aborted", index: i };
			}
		}
		return { type: "incomplete" };
	}
}

export function scanMarkers(text: string): ScannedMarker[] {
	return new MarkerScanner().feed(text);
}

import type { ShellmarkConfig } from "../../config/schema.js";
import {
	type Marker,
	encodeMarker,
	parseExitCode,
	parseMarkerKind,
} from "../../markers/protocol.js";
import { MarkerError } from "../../utils/errors.js";
import type { CommandIO } from "../types.js";

export function buildMarker(kind: string, exitCode?: string): Marker {
	const parsedKind = parseMarkerKind(kind);
	if (parsedKind === "D") {
		return exitCode === undefined
			? { kind: "D" }
			: { kind: "D", exitCode: parseExitCode(exitCode) };
	}
	if (exitCode !== undefined) {
		throw new MarkerError(
			`Marker ${parsedKind} does not take an exit code`,
			exitCode,
		);
	}
	return { kind: parsedKind };
}

export function runEmitCommand(
	kind: string,
	exitCode: string | undefined,
	config: ShellmarkConfig,
	io: CommandIO,
): void {
	io.stdout.write(encodeMarker(buildMarker(kind, exitCode), config.terminator));
}

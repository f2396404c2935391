import pc from "picocolors";
import type { CommandState, CommandStateChange } from "../session/command-state.js";
import { shouldUseColors, shouldUseUnicode } from "./capabilities.js";

const STATE_SYMBOLS: Record<CommandState, { unicode: string; ascii: string }> = {
	idle: { unicode: "○", ascii: "-" },
	running: { unicode: "●", ascii: "*" },
	success: { unicode: "✔", ascii: "+" },
	failure: { unicode: "✖", ascii: "x" },
};

const STATE_COLORS: Record<CommandState, (text: string) => string> = {
	idle: pc.dim,
	running: pc.yellow,
	success: pc.green,
	failure: pc.red,
};

export function stateSymbol(state: CommandState): string {
	const symbol = STATE_SYMBOLS[state];
	return shouldUseUnicode() ? symbol.unicode : symbol.ascii;
}

export function formatState(state: CommandState, exitCode?: number): string {
	const label =
		exitCode !== undefined && (state === "success" || state === "failure")
			? `${state} (exit ${exitCode})`
			: state;
	const text = `${stateSymbol(state)} ${label}`;
	return shouldUseColors() ? STATE_COLORS[state](text) : text;
}

export function formatStateChange(change: CommandStateChange): string {
	const previous = shouldUseColors() ? pc.dim(change.previous) : change.previous;
	return `${previous} -> ${formatState(change.current, change.exitCode)}`;
}

export function formatTable(headers: string[], rows: string[][]): string {
	const colWidths = headers.map((h, i) =>
		Math.max(h.length, ...rows.map((r) => r[i]?.length ?? 0)),
	);

	const headerRow = headers.map((h, i) => h.padEnd(colWidths[i])).join("  ");
	const dataRows = rows.map((row) =>
		row.map((cell, i) => (cell ?? "").padEnd(colWidths[i])).join("  "),
	);

	if (shouldUseColors()) {
		return [pc.bold(headerRow), ...dataRows].join("\n");
	}

	return [headerRow, ...dataRows].join("\n");
}

import { getGlobalConfig } from "../../config/loader.js";
import type { ShellmarkConfig } from "../../config/schema.js";
import { formatTable } from "../../terminal/output.js";
import type { CommandIO } from "../types.js";

export function runConfigCommand(
	config: ShellmarkConfig,
	options: { json?: boolean },
	io: CommandIO,
): void {
	if (options.json) {
		io.stdout.write(`${JSON.stringify(config, null, 2)}\n`);
		return;
	}

	const stored = getGlobalConfig();
	const rows: string[][] = [
		["integrationDir", config.integrationDir],
		["home", config.home],
		["terminator", config.terminator],
		["siteConfig.zsh", config.siteConfig.zsh],
		["siteConfig.bash", config.siteConfig.bash],
		["themeFile", config.themeFile ?? "-"],
		["scannerTailLimit", String(config.scannerTailLimit)],
		["installedAt", stored.installedAt ?? "never"],
	];
	io.stdout.write(`${formatTable(["key", "value"], rows)}\n`);
}

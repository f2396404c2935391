import type { ShellmarkConfig } from "../../config/schema.js";
import { renderBashIntegration } from "../../integration/bash.js";
import { renderZshEnv, renderZshRc } from "../../integration/zsh.js";
import { IntegrationError, IntegrationErrorCode } from "../../utils/errors.js";
import type { CommandIO } from "../types.js";

export const SCRIPT_NAMES = ["zshrc", "zshenv", "bash"] as const;

export type ScriptName = (typeof SCRIPT_NAMES)[number];

function isScriptName(value: string): value is ScriptName {
	return (SCRIPT_NAMES as readonly string[]).includes(value);
}

export function renderScript(name: string, config: ShellmarkConfig): string {
	const normalized = name === "zsh" ? "zshrc" : name;
	if (!isScriptName(normalized)) {
		throw new IntegrationError(
			`Unknown script "${name}". Expected one of: zsh, ${SCRIPT_NAMES.join(", ")}`,
			IntegrationErrorCode.UNKNOWN_SCRIPT,
		);
	}

	switch (normalized) {
		case "zshrc":
			return renderZshRc({
				home: config.home,
				siteConfig: config.siteConfig.zsh,
				themeFile: config.themeFile,
				terminator: config.terminator,
			});
		case "zshenv":
			return renderZshEnv({ home: config.home });
		case "bash":
			return renderBashIntegration({
				home: config.home,
				siteConfig: config.siteConfig.bash,
				themeFile: config.themeFile,
				terminator: config.terminator,
			});
	}
}

export function runScriptCommand(
	name: string,
	config: ShellmarkConfig,
	io: CommandIO,
): void {
	io.stdout.write(renderScript(name, config));
}

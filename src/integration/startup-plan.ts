import path from "node:path";
import type { ShellDialect } from "./dialect.js";

export const DEFAULT_SITE_CONFIG: Record<ShellDialect, string> = {
	zsh: "/etc/zshrc",
	bash: "/etc/bash.bashrc",
};

export interface StartupPlanOptions {
	dialect: ShellDialect;
	/** Config directory the user had before the host redirected it. */
	overrideDir?: string;
	/** Home directory. */
	fallbackDir: string;
	siteConfig?: string;
	themeFile?: string;
}

export type StartupEntryRole = "env" | "site" | "user" | "theme";

export interface StartupEntry {
	role: StartupEntryRole;
	path: string;
}

export function planStartupFiles(options: StartupPlanOptions): StartupEntry[] {
	const siteConfig = options.siteConfig ?? DEFAULT_SITE_CONFIG[options.dialect];
	const entries: StartupEntry[] = [];

	if (options.dialect === "zsh") {
		entries.push({
			role: "env",
			path: path.join(options.overrideDir || options.fallbackDir, ".zshenv"),
		});
		entries.push({ role: "site", path: siteConfig });
		entries.push({
			role: "user",
			path: path.join(options.overrideDir || options.fallbackDir, ".zshrc"),
		});
	} else {
		entries.push({ role: "site", path: siteConfig });
		entries.push({
			role: "user",
			path: path.join(options.fallbackDir, ".bashrc"),
		});
	}

	if (options.themeFile) {
		entries.push({ role: "theme", path: options.themeFile });
	}

	return entries;
}

export function resolveStartupFiles(
	entries: StartupEntry[],
	exists: (filePath: string) => boolean,
): StartupEntry[] {
	return entries.filter((entry) => exists(entry.path));
}

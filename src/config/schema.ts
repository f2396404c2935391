import os from "node:os";
import path from "node:path";
import { z } from "zod";

export const TERMINATOR_SCHEMA = z.enum(["bel", "st"]);

export const SITE_CONFIG_SCHEMA = z.object({
	zsh: z.string().default("/etc/zshrc"),
	bash: z.string().default("/etc/bash.bashrc"),
});

export function defaultIntegrationDir(): string {
	return path.join(os.homedir(), ".config", "shellmark");
}

export const SHELLMARK_CONFIG_SCHEMA = z.object({
	$schema: z.string().optional(),
	integrationDir: z.string().min(1).default(defaultIntegrationDir()),
	home: z.string().min(1).default(os.homedir()),
	terminator: TERMINATOR_SCHEMA.default("bel"),
	siteConfig: SITE_CONFIG_SCHEMA.default({}),
	themeFile: z.string().optional(),
	scannerTailLimit: z.number().int().min(16).max(4096).default(64),
	debug: z.boolean().default(false),
});

export type ShellmarkConfig = z.infer<typeof SHELLMARK_CONFIG_SCHEMA>;
export type SiteConfig = z.infer<typeof SITE_CONFIG_SCHEMA>;

export function createDefaultConfig(): ShellmarkConfig {
	return SHELLMARK_CONFIG_SCHEMA.parse({});
}

export const DEFAULT_CONFIG: ShellmarkConfig = createDefaultConfig();

import Conf from "conf";
import { cosmiconfig } from "cosmiconfig";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { Terminator } from "../markers/protocol.js";
import { debug } from "../utils/debug.js";
import { ConfigError } from "../utils/errors.js";
import { consola } from "../utils/logger.js";
import {
	SHELLMARK_CONFIG_SCHEMA,
	type ShellmarkConfig,
	TERMINATOR_SCHEMA,
	createDefaultConfig,
} from "./schema.js";

const MODULE_NAME = "shellmark";

type GlobalStore = {
	integrationDir?: string;
	terminator?: Terminator;
	installedAt?: string;
};

const globalConfig = new Conf<GlobalStore>({
	projectName: MODULE_NAME,
	cwd: process.env.SHELLMARK_CONFIG_DIR || undefined,
	defaults: {},
});

const explorer = cosmiconfig(MODULE_NAME, {
	cache: false,
	searchPlaces: [
		".shellmark.json",
		".shellmark.yaml",
		".shellmark.yml",
		"package.json",
	],
	loaders: {
		".json": (_path: string, content: string) => JSON.parse(content),
		".yaml": (_path: string, content: string) => parseYaml(content),
		".yml": (_path: string, content: string) => parseYaml(content),
	},
});

export function resolveEnvVars(
	value: string,
	env: NodeJS.ProcessEnv = process.env,
): string {
	return value.replace(
		/\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g,
		(match: string, name: string, fallback: string | undefined) => {
			const resolved = env[name];
			if (resolved) return resolved;
			return fallback ?? match;
		},
	);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveConfigEnvVars(
	config: Record<string, unknown>,
): Record<string, unknown> {
	const resolved: Record<string, unknown> = {};

	for (const [key, value] of Object.entries(config)) {
		if (typeof value === "string") {
			resolved[key] = resolveEnvVars(value);
		} else if (isRecord(value)) {
			resolved[key] = resolveConfigEnvVars(value);
		} else {
			resolved[key] = value;
		}
	}

	return resolved;
}

export async function loadConfig(
	cwd: string = process.cwd(),
): Promise<ShellmarkConfig> {
	let fileConfig: Record<string, unknown> = {};

	try {
		const result = await explorer.search(cwd);
		if (result && isRecord(result.config)) {
			fileConfig = result.config;
			debug.log("config", `Loaded config from: ${result.filepath}`);
		}
	} catch (error) {
		const errorMessage = error instanceof Error ? error.message : String(error);
		consola.warn(`Failed to load config file: ${errorMessage}`);
	}

	const envDir = process.env.SHELLMARK_DIR;
	const rawTerminator = process.env.SHELLMARK_TERMINATOR;
	const envTerminator = TERMINATOR_SCHEMA.safeParse(rawTerminator);
	if (rawTerminator && !envTerminator.success) {
		throw new ConfigError(
			`SHELLMARK_TERMINATOR must be "bel" or "st", got "${rawTerminator}"`,
		);
	}
	const envDebug = process.env.SHELLMARK_DEBUG === "true";
	const stored = getGlobalConfig();

	const mergedConfig: Record<string, unknown> = {
		...resolveConfigEnvVars(fileConfig),
		...(stored.integrationDir && { integrationDir: stored.integrationDir }),
		...(stored.terminator && { terminator: stored.terminator }),
		...(envDir && { integrationDir: envDir }),
		...(envTerminator.success && { terminator: envTerminator.data }),
		...(envDebug && { debug: true }),
	};

	const parsed = SHELLMARK_CONFIG_SCHEMA.safeParse(mergedConfig);
	if (parsed.success) {
		return parsed.data;
	}

	consola.warn(
		"Config validation errors:",
		parsed.error.errors
			.map((e: z.ZodIssue) => `${e.path.join(".")}: ${e.message}`)
			.join(", "),
	);
	return createDefaultConfig();
}

export function saveGlobalConfig(updates: GlobalStore): void {
	if (updates.integrationDir) {
		globalConfig.set("integrationDir", updates.integrationDir);
	}
	if (updates.terminator) {
		globalConfig.set("terminator", updates.terminator);
	}
	globalConfig.set("installedAt", updates.installedAt ?? new Date().toISOString());
}

export function getGlobalConfig(): GlobalStore {
	return {
		integrationDir: globalConfig.get("integrationDir"),
		terminator: globalConfig.get("terminator"),
		installedAt: globalConfig.get("installedAt"),
	};
}

export function resetGlobalConfig(): void {
	globalConfig.clear();
}

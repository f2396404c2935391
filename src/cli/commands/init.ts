import { saveGlobalConfig } from "../../config/loader.js";
import type { ShellmarkConfig } from "../../config/schema.js";
import {
	type IntegrationFiles,
	writeIntegrationFiles,
} from "../../integration/install.js";
import { consola } from "../../utils/logger.js";
import type { InitOptions } from "../types.js";

export async function runInitCommand(
	config: ShellmarkConfig,
	options: InitOptions = {},
): Promise<IntegrationFiles> {
	const dir = options.dir ?? config.integrationDir;
	const files = await writeIntegrationFiles(dir, {
		home: config.home,
		themeFile: options.themeFile ?? config.themeFile,
		siteConfig: config.siteConfig,
		terminator: config.terminator,
	});

	saveGlobalConfig({
		integrationDir: files.dir,
		terminator: config.terminator,
	});

	consola.success(`Shell integration written to ${files.dir}`);
	consola.info(`zsh:  ZDOTDIR=${files.zdotdir}`);
	consola.info(`bash: bash --rcfile ${files.bash}`);
	return files;
}

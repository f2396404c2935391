import path from "node:path";
import fs from "fs-extra";
import type { Terminator } from "../markers/protocol.js";
import { debug } from "../utils/debug.js";
import { IntegrationError, IntegrationErrorCode } from "../utils/errors.js";
import { renderBashIntegration } from "./bash.js";
import { renderZshEnv, renderZshRc } from "./zsh.js";

export const ZDOTDIR_NAME = "zdotdir";
export const BASH_INTEGRATION_FILE = "bash_integration.sh";

export interface IntegrationFileOptions {
	home: string;
	themeFile?: string;
	siteConfig?: { zsh?: string; bash?: string };
	terminator?: Terminator;
}

export interface IntegrationFiles {
	dir: string;
	zdotdir: string;
	zshrc: string;
	zshenv: string;
	bash: string;
}

export function integrationPaths(dir: string): IntegrationFiles {
	const zdotdir = path.join(dir, ZDOTDIR_NAME);
	return {
		dir,
		zdotdir,
		zshrc: path.join(zdotdir, ".zshrc"),
		zshenv: path.join(zdotdir, ".zshenv"),
		bash: path.join(dir, BASH_INTEGRATION_FILE),
	};
}

export function renderIntegrationFiles(
	options: IntegrationFileOptions,
): { zshrc: string; zshenv: string; bash: string } {
	return {
		zshrc: renderZshRc({
			home: options.home,
			themeFile: options.themeFile,
			siteConfig: options.siteConfig?.zsh,
			terminator: options.terminator,
		}),
		zshenv: renderZshEnv({ home: options.home }),
		bash: renderBashIntegration({
			home: options.home,
			themeFile: options.themeFile,
			siteConfig: options.siteConfig?.bash,
			terminator: options.terminator,
		}),
	};
}

export async function writeIntegrationFiles(
	dir: string,
	options: IntegrationFileOptions,
): Promise<IntegrationFiles> {
	const paths = integrationPaths(path.resolve(dir));
	const contents = renderIntegrationFiles(options);

	try {
		await fs.ensureDir(paths.zdotdir);
		await fs.writeFile(paths.zshrc, contents.zshrc, "utf8");
		await fs.writeFile(paths.zshenv, contents.zshenv, "utf8");
		await fs.writeFile(paths.bash, contents.bash, "utf8");
	} catch (error) {
		const errorMsg = error instanceof Error ? error.message : String(error);
		throw new IntegrationError(
			`Failed to write integration files to ${paths.dir}: ${errorMsg}`,
			IntegrationErrorCode.WRITE_FAILED,
			paths.dir,
		);
	}

	debug.log("integration", `Wrote integration files to ${paths.dir}`);
	return paths;
}

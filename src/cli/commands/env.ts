import type { ShellmarkConfig } from "../../config/schema.js";
import { detectDialect } from "../../integration/dialect.js";
import { type ShellLaunch, buildShellLaunch } from "../../integration/environment.js";
import { quoteShellArg } from "../../integration/script-helpers.js";
import { consola } from "../../utils/logger.js";
import type { CommandIO, EnvOptions } from "../types.js";

export function formatLaunch(launch: ShellLaunch): string {
	const lines = Object.entries(launch.env).map(
		([key, value]) => `export ${key}=${quoteShellArg(value)}`,
	);
	const command = [launch.command, ...launch.args].map(quoteShellArg).join(" ");
	lines.push(`# launch: ${command}`);
	return `${lines.join("\n")}\n`;
}

export function runEnvCommand(
	config: ShellmarkConfig,
	options: EnvOptions,
	io: CommandIO,
): ShellLaunch {
	const launch = buildShellLaunch({
		shell: options.shell,
		integrationDir: config.integrationDir,
	});

	if (!launch.integrated) {
		const dialect = detectDialect(launch.command);
		consola.warn(
			dialect
				? `No ${dialect} integration in ${config.integrationDir}; run \`shellmark init\` first`
				: `${launch.command} is not a supported shell (zsh, bash)`,
		);
	}

	io.stdout.write(
		options.json ? `${JSON.stringify(launch, null, 2)}\n` : formatLaunch(launch),
	);
	return launch;
}

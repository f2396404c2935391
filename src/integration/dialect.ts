import path from "node:path";

export type ShellDialect = "zsh" | "bash";

/** Dialect of a shell executable, or null when it has no integration. */
export function detectDialect(shellPath: string): ShellDialect | null {
	const name = path.basename(shellPath.trim()).replace(/^-/, "");
	if (name === "zsh" || name.startsWith("zsh-")) return "zsh";
	if (name === "bash" || name.startsWith("bash-")) return "bash";
	return null;
}

export function resolveShell(env: NodeJS.ProcessEnv = process.env): string {
	return env.SHELL || "/bin/bash";
}

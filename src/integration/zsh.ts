import type { Terminator } from "../markers/protocol.js";
import {
	HANDOFF_VARIABLE,
	generatedHeader,
	markerFormats,
	quoteShellArg,
	sourceIfExists,
} from "./script-helpers.js";
import { planStartupFiles } from "./startup-plan.js";

export interface ZshScriptOptions {
	home: string;
	siteConfig?: string;
	themeFile?: string;
	terminator?: Terminator;
}

export const ZSH_GUARD_VARIABLE = "__shellmark_zsh_hooks";

function renderUserRc(fallbackRc: string): string[] {
	return [
		'if [[ -n "$ZDOTDIR" ]] && [[ -f "$ZDOTDIR/.zshrc" ]]; then',
		'  source "$ZDOTDIR/.zshrc"',
		`elif [[ -f ${quoteShellArg(fallbackRc)} ]]; then`,
		`  source ${quoteShellArg(fallbackRc)}`,
		"fi",
	];
}

// The user's zshenv runs against their own ZDOTDIR. Whatever ZDOTDIR it
// leaves behind is handed to the .zshrc, and ours is put back so zsh still
// reads the integration .zshrc next.
function renderUserEnv(fallbackEnv: string): string[] {
	return [
		'__shellmark_zdotdir="$ZDOTDIR"',
		`if [[ -n "$${HANDOFF_VARIABLE}" ]]; then`,
		`  ZDOTDIR="$${HANDOFF_VARIABLE}"`,
		'  [[ -f "$ZDOTDIR/.zshenv" ]] && source "$ZDOTDIR/.zshenv"',
		"else",
		"  unset ZDOTDIR",
		`  [[ -f ${quoteShellArg(fallbackEnv)} ]] && source ${quoteShellArg(fallbackEnv)}`,
		"fi",
		'if [[ -n "$ZDOTDIR" ]]; then',
		`  export ${HANDOFF_VARIABLE}="$ZDOTDIR"`,
		"else",
		`  unset ${HANDOFF_VARIABLE}`,
		"fi",
		'export ZDOTDIR="$__shellmark_zdotdir"',
		"unset __shellmark_zdotdir",
	];
}

/**
 * The `.zshrc` placed in the redirected ZDOTDIR. It hands ZDOTDIR back to
 * the user's value, sources their startup files and then registers the
 * reporter hooks once.
 */
export function renderZshRc(options: ZshScriptOptions): string {
	const formats = markerFormats(options.terminator);
	// The user's rc location depends on the restored ZDOTDIR, so it is
	// decided when the shell starts rather than here.
	const plan = planStartupFiles({
		dialect: "zsh",
		fallbackDir: options.home,
		siteConfig: options.siteConfig,
		themeFile: options.themeFile,
	});

	const lines = [
		generatedHeader("zsh integration"),
		"# Restore the original ZDOTDIR so the user's config paths resolve",
		`if [[ -n "$${HANDOFF_VARIABLE}" ]]; then`,
		`  export ZDOTDIR="$${HANDOFF_VARIABLE}"`,
		`  unset ${HANDOFF_VARIABLE}`,
		"else",
		"  unset ZDOTDIR",
		"fi",
		"",
	];

	for (const entry of plan) {
		if (entry.role === "env") {
			// Already sourced by the .zshenv wrapper.
			continue;
		}
		if (entry.role === "user") {
			lines.push(...renderUserRc(entry.path));
		} else {
			lines.push(sourceIfExists(entry.path));
		}
	}

	lines.push(
		"",
		"# Prompt and command state markers",
		`if [[ -z "\${${ZSH_GUARD_VARIABLE}-}" ]]; then`,
		`  ${ZSH_GUARD_VARIABLE}=1`,
		"  __shellmark_preexec() {",
		"    __shellmark_running=1",
		`    printf '${formats.commandStart}'`,
		"  }",
		"  __shellmark_precmd() {",
		"    local ec=$?",
		'    if [[ -n "${__shellmark_running-}" ]]; then',
		"      __shellmark_running=",
		`      printf '${formats.commandFinished}' "$ec"`,
		"    fi",
		`    printf '${formats.promptReady}'`,
		"  }",
		"  autoload -Uz add-zsh-hook",
		"  add-zsh-hook precmd __shellmark_precmd",
		"  add-zsh-hook preexec __shellmark_preexec",
		"fi",
		"",
	);

	return lines.join("\n");
}

/**
 * The `.zshenv` in the redirected ZDOTDIR. It sources the user's own
 * `.zshenv` but leaves ZDOTDIR pointing here, otherwise zsh would never
 * read the `.zshrc` above. A ZDOTDIR the user's file sets is passed on
 * through the handoff variable.
 */
export function renderZshEnv(options: Pick<ZshScriptOptions, "home">): string {
	const lines = [generatedHeader("zshenv wrapper")];
	for (const entry of planStartupFiles({
		dialect: "zsh",
		fallbackDir: options.home,
	})) {
		if (entry.role === "env") {
			lines.push(...renderUserEnv(entry.path));
		}
	}
	lines.push("");
	return lines.join("\n");
}

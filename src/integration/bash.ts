import type { Terminator } from "../markers/protocol.js";
import {
	generatedHeader,
	markerFormats,
	sourceIfExists,
} from "./script-helpers.js";
import { planStartupFiles } from "./startup-plan.js";

export interface BashScriptOptions {
	home: string;
	siteConfig?: string;
	themeFile?: string;
	terminator?: Terminator;
}

export const BASH_PROMPT_FUNCTION = "__shellmark_prompt_command";
export const BASH_PREEXEC_FUNCTION = "__shellmark_preexec";
export const BASH_ARM_FUNCTION = "__shellmark_arm";
const PREVIOUS_TRAP_VARIABLE = "__shellmark_prev_debug";

/**
 * Rc file passed to bash with `--rcfile`. bash has no pre-exec hook, so
 * command-start comes from a DEBUG trap that is armed once per prompt.
 * command-finished is only reported for a prompt that follows a command.
 */
export function renderBashIntegration(options: BashScriptOptions): string {
	const formats = markerFormats(options.terminator);
	const plan = planStartupFiles({
		dialect: "bash",
		fallbackDir: options.home,
		siteConfig: options.siteConfig,
		themeFile: options.themeFile,
	});

	const lines = [generatedHeader("bash integration")];
	for (const entry of plan) {
		lines.push(sourceIfExists(entry.path));
	}

	lines.push(
		"",
		"# Prompt and command state markers",
		`${BASH_PROMPT_FUNCTION}() {`,
		"    local ec=$?",
		"    __shellmark_armed=",
		'    if [[ -n "${__shellmark_running-}" ]]; then',
		"        __shellmark_running=",
		`        printf '${formats.commandFinished}' "$ec"`,
		"    fi",
		`    printf '${formats.promptReady}'`,
		"    return $ec",
		"}",
		`${BASH_ARM_FUNCTION}() {`,
		"    __shellmark_armed=1",
		"}",
		// Called from the DEBUG trap with "$_" so the trap leaves both $_ and
		// $? as it found them for any trap chained after it.
		`${BASH_PREEXEC_FUNCTION}() {`,
		"    local ec=$?",
		'    if [[ -z "${COMP_LINE-}" && "${__shellmark_armed-}" == 1 &&',
		`        "$BASH_COMMAND" != ${BASH_PROMPT_FUNCTION} ]]; then`,
		"        __shellmark_armed=",
		"        __shellmark_running=1",
		`        printf '${formats.commandStart}'`,
		"    fi",
		"    return $ec",
		"}",
		// Ours runs first so it sees the finished command's status; the
		// arming step runs last so nothing in PROMPT_COMMAND reports a start.
		`if [[ "\${PROMPT_COMMAND-}" != *${BASH_PROMPT_FUNCTION}* ]]; then`,
		`    PROMPT_COMMAND="${BASH_PROMPT_FUNCTION}\${PROMPT_COMMAND:+;$PROMPT_COMMAND};${BASH_ARM_FUNCTION}"`,
		"fi",
		// An existing DEBUG trap keeps running after ours.
		`if [[ "$(trap -p DEBUG)" != *${BASH_PREEXEC_FUNCTION}* ]]; then`,
		`    ${PREVIOUS_TRAP_VARIABLE}="$(trap -p DEBUG)"`,
		`    ${PREVIOUS_TRAP_VARIABLE}="\${${PREVIOUS_TRAP_VARIABLE}#trap -- }"`,
		`    ${PREVIOUS_TRAP_VARIABLE}="\${${PREVIOUS_TRAP_VARIABLE}% DEBUG}"`,
		`    eval "${PREVIOUS_TRAP_VARIABLE}=\${${PREVIOUS_TRAP_VARIABLE}:-''}"`,
		`    trap -- "${BASH_PREEXEC_FUNCTION} \\"\\$_\\"\${${PREVIOUS_TRAP_VARIABLE}:+; $${PREVIOUS_TRAP_VARIABLE}}" DEBUG`,
		`    unset ${PREVIOUS_TRAP_VARIABLE}`,
		"fi",
		"",
	);

	return lines.join("\n");
}

export {
	BEL,
	ESC,
	OSC_PREFIX,
	ST,
	commandFinished,
	commandStart,
	describeMarker,
	encodeMarker,
	formatExitCode,
	parseExitCode,
	parseMarkerKind,
	promptReady,
} from "./markers/protocol.js";
export type { Marker, MarkerKind, Terminator } from "./markers/protocol.js";
export { MarkerScanner, scanMarkers } from "./markers/scanner.js";
export type { MarkerScannerOptions, ScannedMarker } from "./markers/scanner.js";
export {
	CommandStateTracker,
	SessionMonitor,
} from "./session/command-state.js";
export type {
	CommandState,
	CommandStateChange,
	CommandStateListener,
} from "./session/command-state.js";
export { HookRegistry } from "./reporter/hook-registry.js";
export type {
	HookCallback,
	HookEvent,
	HookHandle,
	PreCmdPayload,
	PreExecPayload,
} from "./reporter/hook-registry.js";
export { SessionStateReporter } from "./reporter/reporter.js";
export type {
	MarkerSink,
	SessionStateReporterOptions,
} from "./reporter/reporter.js";
export { ShellLifecycle } from "./reporter/lifecycle.js";
export type { CommandExecutor, LifecyclePhase } from "./reporter/lifecycle.js";
export { detectDialect } from "./integration/dialect.js";
export type { ShellDialect } from "./integration/dialect.js";
export {
	planStartupFiles,
	resolveStartupFiles,
} from "./integration/startup-plan.js";
export type {
	StartupEntry,
	StartupPlanOptions,
} from "./integration/startup-plan.js";
export { renderZshEnv, renderZshRc } from "./integration/zsh.js";
export { renderBashIntegration } from "./integration/bash.js";
export {
	renderIntegrationFiles,
	writeIntegrationFiles,
} from "./integration/install.js";
export type { IntegrationFiles } from "./integration/install.js";
export { buildShellLaunch } from "./integration/environment.js";
export type { ShellLaunch, ShellLaunchOptions } from "./integration/environment.js";
export {
	ConfigError,
	IntegrationError,
	LifecycleError,
	MarkerError,
	ShellmarkError,
} from "./utils/errors.js";

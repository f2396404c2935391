import { describe, expect, it } from "vitest";
import {
	ConfigError,
	IntegrationError,
	IntegrationErrorCode,
	LifecycleError,
	MarkerError,
	ShellmarkError,
	formatError,
	toJSON,
} from "./errors.js";

describe("errors", () => {
	it("should assign codes and exit codes per class", () => {
		const cases: Array<[ShellmarkError, string, number]> = [
			[new ConfigError("bad"), "CONFIG_ERROR", 2],
			[new MarkerError("bad"), "MARKER_ERROR", 3],
			[
				new IntegrationError("bad", IntegrationErrorCode.UNKNOWN_SCRIPT),
				"INTEGRATION_UNKNOWN_SCRIPT",
				4,
			],
			[new LifecycleError("bad"), "LIFECYCLE_ERROR", 5],
		];

		for (const [error, code, exitCode] of cases) {
			expect(error).toBeInstanceOf(ShellmarkError);
			expect(error.code).toBe(code);
			expect(error.exitCode).toBe(exitCode);
		}
	});

	it("should include the error name in formatted output", () => {
		const formatted = formatError(new MarkerError("Invalid exit code \"x\""));

		expect(formatted).toContain("MarkerError: Invalid exit code \"x\"");
		expect(formatted).not.toContain("\n");
	});

	it("should format non-errors as strings", () => {
		expect(formatError("plain")).toContain("plain");
	});

	it("should serialize errors to plain objects", () => {
		const json = toJSON(new LifecycleError("busy"));

		expect(json.name).toBe("LifecycleError");
		expect(json.message).toBe("busy");
		expect(json.code).toBe("LIFECYCLE_ERROR");
	});
});

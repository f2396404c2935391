import { describe, expect, it } from "vitest";
import { detectDialect, resolveShell } from "./dialect.js";

describe("detectDialect", () => {
	it("should recognise zsh and bash paths", () => {
		expect(detectDialect("/bin/zsh")).toBe("zsh");
		expect(detectDialect("/opt/homebrew/bin/bash")).toBe("bash");
		expect(detectDialect("-zsh")).toBe("zsh");
		expect(detectDialect("/usr/local/bin/bash-5.2")).toBe("bash");
	});

	it("should return null for other shells", () => {
		expect(detectDialect("/usr/bin/fish")).toBeNull();
		expect(detectDialect("/bin/sh")).toBeNull();
	});
});

describe("resolveShell", () => {
	it("should use SHELL and fall back to bash", () => {
		expect(resolveShell({ SHELL: "/bin/zsh" })).toBe("/bin/zsh");
		expect(resolveShell({})).toBe("/bin/bash");
	});
});

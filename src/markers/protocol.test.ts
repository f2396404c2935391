import { describe, expect, it } from "vitest";
import { MarkerError } from "../utils/errors.js";
import {
	commandFinished,
	commandStart,
	describeMarker,
	encodeMarker,
	formatExitCode,
	parseExitCode,
	parseMarkerKind,
	promptReady,
} from "./protocol.js";

describe("marker protocol", () => {
	describe("encodeMarker", () => {
		it("should encode prompt-ready byte-exact", () => {
			expect(promptReady()).toBe("\x1b]133;A\x07");
		});

		it("should encode command-start byte-exact", () => {
			expect(commandStart()).toBe("\x1b]133;B\x07");
		});

		it("should encode command-finished with the exit code", () => {
			expect(commandFinished(0)).toBe("\x1b]133;D;0\x07");
			expect(commandFinished(1)).toBe("\x1b]133;D;1\x07");
			expect(commandFinished(255)).toBe("\x1b]133;D;255\x07");
		});

		it("should pass negative exit codes through in decimal", () => {
			expect(commandFinished(-9)).toBe("\x1b]133;D;-9\x07");
		});

		it("should omit the code for a bare finished marker", () => {
			expect(encodeMarker({ kind: "D" })).toBe("\x1b]133;D\x07");
		});

		it("should use ST when requested", () => {
			expect(promptReady("st")).toBe("\x1b]133;A\x1b\\");
		});
	});

	describe("formatExitCode", () => {
		it("should reject non-integers", () => {
			expect(() => formatExitCode(1.5)).toThrow(MarkerError);
			expect(() => formatExitCode(Number.NaN)).toThrow(MarkerError);
		});
	});

	describe("parseExitCode", () => {
		it("should parse decimal strings", () => {
			expect(parseExitCode("42")).toBe(42);
			expect(parseExitCode(" -2 ")).toBe(-2);
		});

		it("should reject anything else", () => {
			expect(() => parseExitCode("4x")).toThrow(MarkerError);
			expect(() => parseExitCode("")).toThrow(MarkerError);
		});
	});

	describe("parseMarkerKind", () => {
		it("should accept letters and names", () => {
			expect(parseMarkerKind("a")).toBe("A");
			expect(parseMarkerKind("start")).toBe("B");
			expect(parseMarkerKind("Finish")).toBe("D");
		});

		it("should reject unknown kinds", () => {
			expect(() => parseMarkerKind("Z")).toThrow(/Unknown marker kind "Z"/);
		});
	});

	it("should describe markers with readable control bytes", () => {
		expect(describeMarker(commandFinished(3))).toBe("ESC]133;D;3BEL");
		expect(describeMarker(promptReady("st"))).toBe("ESC]133;AST");
	});
});

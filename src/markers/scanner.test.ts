import { describe, expect, it } from "vitest";
import { MarkerScanner, scanMarkers } from "./scanner.js";

describe("MarkerScanner", () => {
	it("should find markers in a single chunk", () => {
		const found = scanMarkers(
			"ls\r\n\x1b]133;B\x07file.txt\r\n\x1b]133;D;0\x07\x1b]133;A\x07$ ",
		);

		expect(found.map((m) => m.marker)).toEqual([
			{ kind: "B" },
			{ kind: "D", exitCode: 0 },
			{ kind: "A" },
		]);
		expect(found[1].raw).toBe("\x1b]133;D;0\x07");
	});

	it("should complete a marker split across chunks exactly once", () => {
		const scanner = new MarkerScanner();

		expect(scanner.feed("output\x1b]13")).toEqual([]);
		expect(scanner.pendingLength).toBe(4);
		expect(scanner.feed("3;D;12")).toEqual([]);

		const found = scanner.feed("7\x07more");
		expect(found).toHaveLength(1);
		expect(found[0].marker).toEqual({ kind: "D", exitCode: 127 });
		expect(scanner.pendingLength).toBe(0);
		expect(scanner.feed("more")).toEqual([]);
	});

	it("should hold back a lone trailing ESC", () => {
		const scanner = new MarkerScanner();

		expect(scanner.feed("abc\x1b")).toEqual([]);
		expect(scanner.pendingLength).toBe(1);
		expect(scanner.feed("]133;B\x07")[0].marker).toEqual({ kind: "B" });
	});

	it("should accept the ST terminator, including one split across chunks", () => {
		const scanner = new MarkerScanner();

		expect(scanner.feed("\x1b]133;A\x1b")).toEqual([]);
		const found = scanner.feed("\\");
		expect(found).toHaveLength(1);
		expect(found[0].terminator).toBe("st");
		expect(found[0].marker).toEqual({ kind: "A" });
	});

	it("should decode byte chunks", () => {
		const scanner = new MarkerScanner();
		const bytes = new TextEncoder().encode("\x1b]133;D;2\x07");

		expect(scanner.feed(bytes.subarray(0, 5))).toEqual([]);
		expect(scanner.feed(bytes.subarray(5))[0].marker).toEqual({
			kind: "D",
			exitCode: 2,
		});
	});

	it("should report a finished marker without a usable code as bare", () => {
		expect(scanMarkers("\x1b]133;D\x07")[0].marker).toEqual({ kind: "D" });
		expect(scanMarkers("\x1b]133;D;\x07")[0].marker).toEqual({ kind: "D" });
		expect(scanMarkers("\x1b]133;D;x\x07")[0].marker).toEqual({ kind: "D" });
	});

	it("should read the exit code before extra parameters", () => {
		expect(scanMarkers("\x1b]133;D;1;aid=7\x07")[0].marker).toEqual({
			kind: "D",
			exitCode: 1,
		});
	});

	it("should recognise output-start and ignore unknown kinds", () => {
		const found = scanMarkers("\x1b]133;C\x07\x1b]133;P;k=i\x07");
		expect(found.map((m) => m.marker.kind)).toEqual(["C"]);
	});

	it("should skip a sequence interrupted by another escape", () => {
		const found = scanMarkers("\x1b]133;B\x1b[0m\x1b]133;A\x07");
		expect(found.map((m) => m.marker)).toEqual([{ kind: "A" }]);
	});

	it("should drop an unterminated tail over the limit", () => {
		const scanner = new MarkerScanner({ tailLimit: 16 });

		expect(scanner.feed(`\x1b]133;D;${"9".repeat(20)}`)).toEqual([]);
		expect(scanner.pendingLength).toBe(0);
	});

	it("should ignore other OSC sequences", () => {
		expect(scanMarkers("\x1b]0;title\x07\x1b]1337;X\x07")).toEqual([]);
	});

	it("should discard pending input on flush", () => {
		const scanner = new MarkerScanner();
		scanner.feed("\x1b]133;");
		scanner.flush();

		expect(scanner.pendingLength).toBe(0);
		expect(scanner.feed("B\x07")).toEqual([]);
	});
});

import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../utils/errors.js";
import {
	getGlobalConfig,
	loadConfig,
	resetGlobalConfig,
	resolveEnvVars,
	saveGlobalConfig,
} from "./loader.js";

describe("Config Loader", () => {
	const testDir = path.join(os.tmpdir(), "shellmark-config-test");
	const originalEnv = process.env;

	beforeEach(async () => {
		await fs.ensureDir(testDir);
		process.env = { ...originalEnv };
		delete process.env.SHELLMARK_DIR;
		delete process.env.SHELLMARK_TERMINATOR;
		delete process.env.SHELLMARK_DEBUG;
		resetGlobalConfig();
	});

	afterEach(async () => {
		await fs.remove(testDir);
		process.env = originalEnv;
		resetGlobalConfig();
	});

	describe("loadConfig", () => {
		it("should return default config when no config file exists", async () => {
			const config = await loadConfig(testDir);

			expect(config.terminator).toBe("bel");
			expect(config.integrationDir).toBe(
				path.join(os.homedir(), ".config", "shellmark"),
			);
		});

		it("should read a JSON config file", async () => {
			await fs.writeJson(path.join(testDir, ".shellmark.json"), {
				terminator: "st",
				themeFile: "/opt/theme.zsh",
			});

			const config = await loadConfig(testDir);

			expect(config.terminator).toBe("st");
			expect(config.themeFile).toBe("/opt/theme.zsh");
		});

		it("should read a YAML config file", async () => {
			await fs.writeFile(
				path.join(testDir, ".shellmark.yaml"),
				"integrationDir: /srv/shellmark\nscannerTailLimit: 128\n",
			);

			const config = await loadConfig(testDir);

			expect(config.integrationDir).toBe("/srv/shellmark");
			expect(config.scannerTailLimit).toBe(128);
		});

		it("should expand environment references in file values", async () => {
			process.env.SHELLMARK_TEST_HOME = "/home/tester";
			await fs.writeJson(path.join(testDir, ".shellmark.json"), {
				home: "${SHELLMARK_TEST_HOME}",
				themeFile: "${SHELLMARK_TEST_MISSING:-/opt/default.zsh}",
			});

			const config = await loadConfig(testDir);

			expect(config.home).toBe("/home/tester");
			expect(config.themeFile).toBe("/opt/default.zsh");
		});

		it("should fall back to defaults on invalid config", async () => {
			await fs.writeJson(path.join(testDir, ".shellmark.json"), {
				terminator: "nul",
				themeFile: "/opt/theme.zsh",
			});

			const config = await loadConfig(testDir);

			expect(config.terminator).toBe("bel");
			expect(config.themeFile).toBeUndefined();
		});

		it("should prioritize env vars over file config", async () => {
			await fs.writeJson(path.join(testDir, ".shellmark.json"), {
				integrationDir: "/from/file",
			});
			process.env.SHELLMARK_DIR = "/from/env";

			const config = await loadConfig(testDir);

			expect(config.integrationDir).toBe("/from/env");
		});

		it("should reject an invalid SHELLMARK_TERMINATOR", async () => {
			process.env.SHELLMARK_TERMINATOR = "nul";

			await expect(loadConfig(testDir)).rejects.toBeInstanceOf(ConfigError);
		});

		it("should enable debug from SHELLMARK_DEBUG", async () => {
			process.env.SHELLMARK_DEBUG = "true";

			const config = await loadConfig(testDir);

			expect(config.debug).toBe(true);
		});
	});

	describe("saveGlobalConfig", () => {
		it("should use the stored integration dir over the file", async () => {
			await fs.writeJson(path.join(testDir, ".shellmark.json"), {
				integrationDir: "/from/file",
			});
			saveGlobalConfig({ integrationDir: "/from/store" });

			const config = await loadConfig(testDir);
			expect(config.integrationDir).toBe("/from/store");
		});

		it("should record the install time", () => {
			saveGlobalConfig({ installedAt: "2026-01-02T03:04:05.000Z" });

			expect(getGlobalConfig().installedAt).toBe("2026-01-02T03:04:05.000Z");
		});
	});

	describe("resetGlobalConfig", () => {
		it("should clear global config", () => {
			saveGlobalConfig({ integrationDir: "/from/store", terminator: "st" });
			resetGlobalConfig();

			expect(getGlobalConfig()).toEqual({
				integrationDir: undefined,
				terminator: undefined,
				installedAt: undefined,
			});
		});
	});

	describe("resolveEnvVars", () => {
		it("should leave unknown references without default untouched", () => {
			expect(resolveEnvVars("${NOPE}/x", {})).toBe("${NOPE}/x");
			expect(resolveEnvVars("a-${A}-b", { A: "1" })).toBe("a-1-b");
		});
	});
});

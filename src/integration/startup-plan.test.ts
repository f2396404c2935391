import { describe, expect, it } from "vitest";
import { planStartupFiles, resolveStartupFiles } from "./startup-plan.js";

describe("planStartupFiles", () => {
	it("should order zsh files env, site, user", () => {
		const plan = planStartupFiles({ dialect: "zsh", fallbackDir: "/home/dev" });

		expect(plan).toEqual([
			{ role: "env", path: "/home/dev/.zshenv" },
			{ role: "site", path: "/etc/zshrc" },
			{ role: "user", path: "/home/dev/.zshrc" },
		]);
	});

	it("should prefer the override dir for zsh user files", () => {
		const plan = planStartupFiles({
			dialect: "zsh",
			overrideDir: "/home/dev/.config/zsh",
			fallbackDir: "/home/dev",
			themeFile: "/tmp/theme.zsh",
		});

		expect(plan.map((entry) => entry.path)).toEqual([
			"/home/dev/.config/zsh/.zshenv",
			"/etc/zshrc",
			"/home/dev/.config/zsh/.zshrc",
			"/tmp/theme.zsh",
		]);
	});

	it("should order bash files site, user, theme", () => {
		const plan = planStartupFiles({
			dialect: "bash",
			fallbackDir: "/home/dev",
			siteConfig: "/etc/bashrc",
			themeFile: "/tmp/theme.sh",
		});

		expect(plan).toEqual([
			{ role: "site", path: "/etc/bashrc" },
			{ role: "user", path: "/home/dev/.bashrc" },
			{ role: "theme", path: "/tmp/theme.sh" },
		]);
	});
});

describe("resolveStartupFiles", () => {
	it("should keep only existing files in plan order", () => {
		const plan = planStartupFiles({ dialect: "zsh", fallbackDir: "/home/dev" });
		const existing = new Set(["/home/dev/.zshrc", "/home/dev/.zshenv"]);

		const resolved = resolveStartupFiles(plan, (p) => existing.has(p));

		expect(resolved.map((entry) => entry.role)).toEqual(["env", "user"]);
	});

	it("should return nothing when no file exists", () => {
		const plan = planStartupFiles({ dialect: "bash", fallbackDir: "/nowhere" });

		expect(resolveStartupFiles(plan, () => false)).toEqual([]);
	});
});

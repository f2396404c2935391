import os from "node:os";
import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		env: {
			SHELLMARK_DEBUG: "false",
			SHELLMARK_CONFIG_DIR: path.join(os.tmpdir(), "shellmark-test-store"),
		},
	},
});

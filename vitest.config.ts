import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@mimicode/core": pkg("core"),
			"@mimicode/model": pkg("model"),
			"@mimicode/agent": pkg("agent"),
			"@mimicode/cli": pkg("cli"),
		},
	},
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		setupFiles: ["./vitest.setup.ts"],
		environment: "node",
	},
});

import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));
const pkg = (name: string) => path.join(root, "packages", name, "src", "index.ts");

export default defineConfig({
	resolve: {
		alias: {
			"@ember/core": pkg("core"),
			"@ember/llm": pkg("llm"),
			"@ember/skills": pkg("skills"),
			"@ember/sessions": pkg("sessions"),
			"@ember/daemon": pkg("daemon"),
		},
	},
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		setupFiles: ["./vitest.setup.ts"],
		testTimeout: 15_000,
	},
});

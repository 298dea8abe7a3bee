import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@vastlint/schema": fileURLToPath(new URL("./packages/schema/src/index.ts", import.meta.url)),
		},
	},
	test: {
		include: ["packages/*/tests/**/*.test.ts"],
		environment: "node",
	},
});

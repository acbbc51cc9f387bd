import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@playlist-agents/shared": fileURLToPath(
				new URL("./packages/shared/src", import.meta.url),
			),
		},
	},
	test: {
		include: ["apps/*/src/**/*.test.ts", "packages/*/src/**/*.test.ts"],
		environment: "node",
	},
});

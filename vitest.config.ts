import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/tests/**/*.test.ts", "server/tests/**/*.test.ts"],
		environment: "node"
	}
});

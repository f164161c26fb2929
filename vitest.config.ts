import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["mcp-server-football-sql/src/**/*.test.ts"],
		environment: "node",
	},
})

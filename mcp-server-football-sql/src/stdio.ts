#!/usr/bin/env node
/**
 * Stdio entry point for the Football SQL MCP Server
 *
 * Config priority (see config/loadConfig.ts):
 *   1. Environment variables
 *   2. config/config.local.yaml
 *   3. config/config.yaml
 *
 * Usage:
 *   node stdio.js
 *   CONFIG_DIR=/etc/football-sql DB_HOST=db node stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { loadConfig } from "./config/loadConfig.js"
import { createEngine } from "./engine.js"
import createServer from "./index.js"
import { createStderrLogger } from "./logger.js"
import { PgExecutor, createPool } from "./pg_executor.js"
import { SidecarClient } from "./sidecar_client.js"

async function main() {
	const config = loadConfig()
	const logger = createStderrLogger(config.logging.level)

	const engine = createEngine(config.catalog.dir, {
		defaultLimit: config.engine.default_limit,
		maxLimit: config.engine.max_limit,
	})
	logger.info("Catalog loaded", { dir: config.catalog.dir, relations: engine.catalog.relations.length })

	const pool = createPool(config.database)
	pool.on("error", (err) => logger.error("Idle pool client error", { error: err.message }))
	const executor = new PgExecutor(pool, config.database.statement_timeout_ms, logger)

	let proposer: SidecarClient | null = null
	if (config.sidecar.enabled) {
		proposer = new SidecarClient({ baseUrl: config.sidecar.url, timeoutMs: config.sidecar.timeout_ms })
		const healthy = await proposer.healthCheck()
		logger.info("SQL sidecar configured", { url: config.sidecar.url, healthy })
	}

	logger.info("Starting Football SQL MCP Server with stdio transport", {
		database: `${config.database.host}:${config.database.port}/${config.database.name}`,
		max_attempts: config.orchestrator.max_attempts,
	})

	const server = createServer({
		engine,
		executor,
		proposer,
		maxAttempts: config.orchestrator.max_attempts,
		logger,
	})

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("Football SQL MCP Server running via stdio")

	const shutdown = () => {
		logger.info("Shutting down...")
		Promise.all([server.close(), pool.end()])
			.then(() => process.exit(0))
			.catch((err) => {
				logger.error("Shutdown failed", { error: String(err) })
				process.exit(1)
			})
	}

	process.on("SIGINT", shutdown)
	process.on("SIGTERM", shutdown)
}

main().catch((error) => {
	console.error("[ERROR] Fatal error:", error instanceof Error ? error.message : error)
	process.exit(1)
})

/**
 * Catalog drift check
 *
 * Compares config/catalog/relations.json with the live database and exits
 * non-zero when a relation or allow-listed column is missing.
 *
 * Usage:
 *   npx tsx mcp-server-football-sql/scripts/check_catalog.ts
 */

import { CatalogDriftChecker, formatDriftReport } from "../src/catalog_sync.js"
import { loadCatalog } from "../src/catalog.js"
import { loadConfig } from "../src/config/loadConfig.js"
import { createStderrLogger } from "../src/logger.js"
import { createPool } from "../src/pg_executor.js"

async function main() {
	const config = loadConfig()
	const logger = createStderrLogger(config.logging.level)
	const catalog = loadCatalog(config.catalog.dir)
	const pool = createPool(config.database)

	try {
		const report = await new CatalogDriftChecker(pool, logger).check(catalog)
		console.log(`\n=== Catalog drift (${report.checkedAt}) ===\n`)
		console.log(formatDriftReport(report))
		process.exitCode = report.inSync ? 0 : 1
	} finally {
		await pool.end()
	}
}

main().catch((error) => {
	console.error("[ERROR]", error instanceof Error ? error.message : error)
	process.exit(1)
})

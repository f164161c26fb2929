/**
 * Route a file of questions (one per line) and print category, source and
 * SQL or retry reason for each. No database needed.
 *
 * Usage:
 *   npx tsx mcp-server-football-sql/scripts/route_questions.ts questions.txt
 *   npx tsx mcp-server-football-sql/scripts/route_questions.ts questions.txt --json
 */

import * as fs from "fs"
import { qualifiedName } from "../src/catalog.js"
import { loadConfig } from "../src/config/loadConfig.js"
import { createEngine } from "../src/engine.js"

function main() {
	const file = process.argv[2]
	const asJson = process.argv.includes("--json")
	if (!file) {
		console.error("Usage: route_questions.ts <questions.txt> [--json]")
		process.exit(1)
	}

	const config = loadConfig()
	const engine = createEngine(config.catalog.dir, {
		defaultLimit: config.engine.default_limit,
		maxLimit: config.engine.max_limit,
	})

	const questions = fs
		.readFileSync(file, "utf-8")
		.split("\n")
		.map((l) => l.trim())
		.filter((l) => l.length > 0 && !l.startsWith("#"))

	let accepted = 0
	const results = questions.map((question) => {
		const run = engine.run(question)
		if (run.status === "accepted") {
			accepted++
			return {
				question,
				status: "accepted" as const,
				category: run.decision.category,
				source: qualifiedName(run.decision.source),
				sql: run.sql,
				warning: run.verdict.warning,
			}
		}
		return {
			question,
			status: "retry" as const,
			category: run.token.category,
			kind: run.token.kind,
			reason: run.token.reason,
		}
	})

	if (asJson) {
		console.log(JSON.stringify(results, null, 2))
		return
	}

	for (const r of results) {
		console.log(`\n> ${r.question}`)
		if (r.status === "accepted") {
			console.log(`  ${r.category} -> ${r.source}`)
			console.log(r.sql.replace(/^/gm, "    "))
			if (r.warning) console.log(`  warning: ${r.warning}`)
		} else {
			console.log(`  RETRY (${r.kind}) ${r.reason}`)
		}
	}
	console.log(`\n${accepted}/${results.length} routed and accepted`)
}

main()

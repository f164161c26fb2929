/**
 * Catalog Drift Check
 *
 * Compares the static relation catalog with a live database through
 * information_schema. Used at deployment time (scripts/check_catalog.ts),
 * never on the request path: the router and validator only ever see the
 * static catalog.
 */

import type { RelationRef } from "./catalog_types.js"
import { qualifiedName, type Catalog } from "./catalog.js"
import type { Logger } from "./logger.js"
import type { ConnectionPool } from "./pg_executor.js"

// ============================================================================
// Types
// ============================================================================

export interface RelationDrift {
	relation: string
	/** Relation absent from the database */
	missing: boolean
	/** Live kind differs from the catalog (table vs view) */
	kindMismatch: boolean
	/** Allow-listed columns the database does not have */
	missingColumns: string[]
	/** Live columns not on the allow-list (informational) */
	extraColumns: string[]
}

export interface DriftReport {
	checkedAt: string
	relations: RelationDrift[]
	/** True when every relation exists with every allow-listed column */
	inSync: boolean
}

interface LiveColumnRow {
	table_schema: string
	table_name: string
	table_type: string
	column_name: string
}

// ============================================================================
// Checker
// ============================================================================

const LIVE_COLUMNS_QUERY = `
	SELECT
		t.table_schema,
		t.table_name,
		t.table_type,
		c.column_name
	FROM information_schema.tables t
	JOIN information_schema.columns c
		ON c.table_schema = t.table_schema
		AND c.table_name = t.table_name
	WHERE t.table_schema = ANY($1)
		AND t.table_name = ANY($2)
	ORDER BY t.table_schema, t.table_name, c.ordinal_position
`

function toLiveRow(row: Record<string, unknown>): LiveColumnRow | null {
	const { table_schema, table_name, table_type, column_name } = row
	if (
		typeof table_schema !== "string" ||
		typeof table_name !== "string" ||
		typeof table_type !== "string" ||
		typeof column_name !== "string"
	) {
		return null
	}
	return { table_schema, table_name, table_type, column_name }
}

function compareRelation(rel: RelationRef, live: LiveColumnRow[]): RelationDrift {
	const name = qualifiedName(rel)
	if (live.length === 0) {
		return { relation: name, missing: true, kindMismatch: false, missingColumns: [...rel.allowedColumns], extraColumns: [] }
	}
	const liveKind = live[0].table_type === "VIEW" ? "view" : "table"
	const liveColumns = live.map((r) => r.column_name)
	return {
		relation: name,
		missing: false,
		kindMismatch: liveKind !== rel.kind,
		missingColumns: rel.allowedColumns.filter((c) => !liveColumns.includes(c)),
		extraColumns: liveColumns.filter((c) => !rel.allowedColumns.includes(c)),
	}
}

export class CatalogDriftChecker {
	constructor(
		private readonly pool: ConnectionPool,
		private readonly logger: Logger,
	) {}

	async check(catalog: Catalog): Promise<DriftReport> {
		const startTime = Date.now()
		const schemas = [...new Set(catalog.relations.map((r) => r.schema))]
		const names = catalog.relations.map((r) => r.name)

		const client = await this.pool.connect()
		let rows: LiveColumnRow[]
		try {
			const result = await client.query(LIVE_COLUMNS_QUERY, [schemas, names])
			rows = result.rows.map(toLiveRow).filter((r): r is LiveColumnRow => r !== null)
		} finally {
			client.release()
		}

		const relations = catalog.relations.map((rel) =>
			compareRelation(
				rel,
				rows.filter((r) => r.table_schema === rel.schema && r.table_name === rel.name),
			),
		)
		const inSync = relations.every((r) => !r.missing && !r.kindMismatch && r.missingColumns.length === 0)

		this.logger.info("Catalog drift check complete", {
			relations: relations.length,
			in_sync: inSync,
			latency_ms: Date.now() - startTime,
		})

		return { checkedAt: new Date().toISOString(), relations, inSync }
	}
}

/**
 * Human-readable report, one line per drifting relation
 */
export function formatDriftReport(report: DriftReport): string {
	const lines: string[] = []
	for (const r of report.relations) {
		if (r.missing) {
			lines.push(`MISSING   ${r.relation}`)
			continue
		}
		if (r.kindMismatch) {
			lines.push(`KIND      ${r.relation}`)
		}
		if (r.missingColumns.length > 0) {
			lines.push(`COLUMNS   ${r.relation}: ${r.missingColumns.join(", ")}`)
		}
	}
	if (lines.length === 0) {
		lines.push(`OK        ${report.relations.length} relations in sync`)
	}
	return lines.join("\n")
}

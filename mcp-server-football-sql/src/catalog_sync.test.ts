import { describe, it, expect } from "vitest"
import { fileURLToPath } from "url"
import { CatalogDriftChecker, formatDriftReport } from "./catalog_sync.js"
import { loadCatalog, type Catalog } from "./catalog.js"
import { silentLogger } from "./logger.js"
import type { ConnectionPool, PooledConnection } from "./pg_executor.js"

const CATALOG_DIR = fileURLToPath(new URL("../../config/catalog", import.meta.url))
const catalog = loadCatalog(CATALOG_DIR)

type LiveRow = Record<string, unknown>

/** information_schema rows for every catalog relation, as a live database would return them */
function liveRows(c: Catalog): LiveRow[] {
	return c.relations.flatMap((rel) =>
		rel.allowedColumns.map((column) => ({
			table_schema: rel.schema,
			table_name: rel.name,
			table_type: rel.kind === "view" ? "VIEW" : "BASE TABLE",
			column_name: column,
		})),
	)
}

class FakePool implements ConnectionPool {
	readonly calls: { text: string; values?: unknown[] }[] = []

	constructor(private readonly rows: LiveRow[]) {}

	async connect(): Promise<PooledConnection> {
		return {
			query: async (text: string, values?: unknown[]) => {
				this.calls.push({ text, values })
				return { rows: this.rows }
			},
			release: () => {},
		}
	}

	async end(): Promise<void> {}
}

describe("CatalogDriftChecker", () => {
	it("should report a database that matches the catalog", async () => {
		const pool = new FakePool(liveRows(catalog))
		const report = await new CatalogDriftChecker(pool, silentLogger).check(catalog)

		expect(report.inSync).toBe(true)
		expect(formatDriftReport(report)).toBe("OK        15 relations in sync")
		expect(pool.calls[0].values).toEqual([["public"], catalog.relations.map((r) => r.name)])
	})

	it("should report missing relations, kinds and columns", async () => {
		const rows = liveRows(catalog)
			.filter((r) => r.table_name !== "pl_matches")
			.filter((r) => !(r.table_name === "v_team_season_summary" && r.column_name === "clean_sheets"))
			.map((r) => (r.table_name === "v_team_win_streaks" ? { ...r, table_type: "BASE TABLE" } : r))
		rows.push({ table_schema: "public", table_name: "v_team_matches", table_type: "VIEW", column_name: "attendance" })

		const report = await new CatalogDriftChecker(new FakePool(rows), silentLogger).check(catalog)

		expect(report.inSync).toBe(false)
		const byName = new Map(report.relations.map((r) => [r.relation, r]))
		expect(byName.get("public.pl_matches")?.missing).toBe(true)
		expect(byName.get("public.v_team_season_summary")?.missingColumns).toEqual(["clean_sheets"])
		expect(byName.get("public.v_team_win_streaks")?.kindMismatch).toBe(true)
		expect(byName.get("public.v_team_matches")?.extraColumns).toEqual(["attendance"])

		expect(formatDriftReport(report)).toBe(
			[
				"COLUMNS   public.v_team_season_summary: clean_sheets",
				"MISSING   public.pl_matches",
				"KIND      public.v_team_win_streaks",
			].join("\n"),
		)
	})

	it("should ignore malformed rows", async () => {
		const rows: LiveRow[] = [...liveRows(catalog), { table_schema: "public", table_name: 7 }]
		const report = await new CatalogDriftChecker(new FakePool(rows), silentLogger).check(catalog)
		expect(report.inSync).toBe(true)
	})
})

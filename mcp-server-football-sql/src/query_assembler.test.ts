import { describe, it, expect } from "vitest"
import type { RelationRef, RoutingDecision } from "./catalog_types.js"
import { assembleQuery, sqlLiteral } from "./query_assembler.js"

const summary: RelationRef = {
	schema: "public",
	name: "v_team_season_summary",
	kind: "view",
	subject: "team",
	role: "team_season_summary",
	grain: ["team", "season_start"],
	allowedColumns: ["team", "season_start", "points", "goals_for"],
	preferredView: null,
	metricScope: "club",
	streak: null,
}

function decision(overrides: Partial<RoutingDecision>): RoutingDecision {
	return {
		category: "CLUB_METRIC_SEASON",
		source: summary,
		constraints: [],
		metric: { phrase: "points", column: "points", direction: "DESC" },
		aggregate: null,
		projection: ["team", "season_start"],
		team: null,
		limit: 1,
		candidates: [summary],
		matchedKeywords: ["in a season"],
		...overrides,
	}
}

describe("sqlLiteral", () => {
	it("should render numbers bare", () => {
		expect(sqlLiteral(1)).toBe("1")
	})

	it("should quote strings and double embedded quotes", () => {
		expect(sqlLiteral("Nott'm Forest")).toBe("'Nott''m Forest'")
	})
})

describe("assembleQuery", () => {
	it("should render a plain ordered query", () => {
		expect(assembleQuery(decision({}))).toBe(
			"SELECT team, season_start, points\n" +
				"FROM public.v_team_season_summary\n" +
				"ORDER BY points DESC NULLS LAST\n" +
				"LIMIT 1",
		)
	})

	it("should render filters, grouping and an aggregate alias", () => {
		const sql = assembleQuery(
			decision({
				category: "CLUB_METRIC_ALL_TIME",
				constraints: [
					{ kind: "where", column: "team", value: "Nott'm Forest" },
					{ kind: "group_by", columns: ["team"] },
				],
				metric: { phrase: "goals", column: "goals_for", direction: "ASC" },
				aggregate: { fn: "SUM", argument: "goals_for", alias: "total_goals_for" },
				projection: ["team"],
				limit: 3,
			}),
		)
		expect(sql).toBe(
			"SELECT team, SUM(goals_for) AS total_goals_for\n" +
				"FROM public.v_team_season_summary\n" +
				"WHERE team = 'Nott''m Forest'\n" +
				"GROUP BY team\n" +
				"ORDER BY total_goals_for ASC NULLS LAST\n" +
				"LIMIT 3",
		)
	})

	it("should join several filters with AND and merge group-by columns", () => {
		const sql = assembleQuery(
			decision({
				constraints: [
					{ kind: "where", column: "season_start", value: 2003 },
					{ kind: "where", column: "team", value: "Arsenal" },
					{ kind: "group_by", columns: ["team"] },
					{ kind: "group_by", columns: ["team", "season_start"] },
				],
			}),
		)
		expect(sql).toContain("WHERE season_start = 2003 AND team = 'Arsenal'\nGROUP BY team, season_start\n")
	})

	it("should be deterministic", () => {
		const d = decision({ limit: 10 })
		expect(assembleQuery(d)).toBe(assembleQuery(d))
	})
})

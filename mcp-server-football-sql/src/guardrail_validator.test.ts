import { describe, it, expect, beforeAll } from "vitest"
import { fileURLToPath } from "url"
import { INTENT_CATEGORIES } from "./catalog_types.js"
import { loadCatalog } from "./catalog.js"
import { GuardrailValidator, compressIssuesForRepair, formatIssuesForLog } from "./guardrail_validator.js"

const CATALOG_DIR = fileURLToPath(new URL("../../config/catalog", import.meta.url))

let validator: GuardrailValidator

beforeAll(() => {
	validator = new GuardrailValidator(loadCatalog(CATALOG_DIR), { maxLimit: 100 })
})

const SEASON_SQL = "SELECT team, season_start, points FROM v_team_season_summary ORDER BY points DESC NULLS LAST LIMIT 1"

describe("GuardrailValidator — read-only", () => {
	it("should accept a plain SELECT", () => {
		const v = validator.validate(SEASON_SQL, "CLUB_METRIC_SEASON")
		expect(v.ok).toBe(true)
		expect(v.violatedRule).toBeNull()
		expect(v.warning).toBeNull()
		expect(v.issues).toEqual([])
	})

	it("should accept one trailing semicolon", () => {
		expect(validator.validate(`${SEASON_SQL};`, "CLUB_METRIC_SEASON").ok).toBe(true)
	})

	it("should reject statements that are not SELECT", () => {
		const v = validator.validate("DELETE FROM pl_matches", "CLUB_METRIC_SEASON")
		expect(v.violatedRule).toBe("NOT_SELECT_ONLY")
		expect(v.issues[0].message).toBe('Statement must start with SELECT or WITH, found "delete"')
	})

	it("should reject stacked statements", () => {
		const v = validator.validate(`${SEASON_SQL}; DROP TABLE pl_matches`, "CLUB_METRIC_SEASON")
		expect(v.violatedRule).toBe("NOT_SELECT_ONLY")
		expect(v.issues.map((i) => i.message)).toContain("Multiple statements detected (separated by semicolons)")
	})

	it("should reject a WITH chain that ends in DML", () => {
		const v = validator.validate(
			"WITH x AS (SELECT team FROM v_team_season_summary) DELETE FROM pl_matches",
			"CLUB_METRIC_SEASON",
		)
		expect(v.violatedRule).toBe("NOT_SELECT_ONLY")
	})

	it("should reject dangerous functions", () => {
		const v = validator.validate("SELECT pg_sleep(5), team FROM v_team_season_summary LIMIT 1", "CLUB_METRIC_SEASON")
		expect(v.violatedRule).toBe("DANGEROUS_FUNCTION")
		expect(v.issues[0].message).toBe("Dangerous functions detected: pg_sleep")
	})

	it.each([
		["query_to_xml", "query_to_xml('SELECT * FROM pg_authid', true, true, '')"],
		["table_to_xml", "table_to_xml('pl_matches', true, false, '')"],
		["nextval", "nextval('standings_id_seq')"],
		["setval", "setval('standings_id_seq', 1)"],
	])("should reject %s", (name, call) => {
		const v = validator.validate(`SELECT team, ${call} AS x FROM public.v_team_season_summary LIMIT 1`, "CLUB_METRIC_SEASON")
		expect(v.ok).toBe(false)
		expect(v.violatedRule).toBe("DANGEROUS_FUNCTION")
		expect(v.issues[0].message).toBe(`Dangerous functions detected: ${name}`)
	})

	it("should reject quoted function names", () => {
		const v = validator.validate(
			'SELECT team, "nextval"(\'standings_id_seq\') AS x FROM v_team_season_summary LIMIT 1',
			"CLUB_METRIC_SEASON",
		)
		expect(v.violatedRule).toBe("DANGEROUS_FUNCTION")
	})

	it("should accept aggregate, window and scalar functions", () => {
		const sql =
			"SELECT team, season_start, COALESCE(points, 0) AS pts, RANK() OVER (ORDER BY points DESC) AS pos " +
			"FROM v_team_season_summary ORDER BY pts DESC LIMIT 1"
		const v = validator.validate(sql, "CLUB_METRIC_SEASON")
		expect(v.issues).toEqual([])
	})

	it("should not treat a CTE column list as a function call", () => {
		const sql =
			"WITH best (team, pts) AS (SELECT team, MAX(points) FROM v_team_season_summary GROUP BY team) " +
			"SELECT team, pts FROM best ORDER BY pts DESC LIMIT 1"
		expect(validator.validate(sql, "CLUB_METRIC_ALL_TIME").violatedRule).toBeNull()
	})

	it("should ignore keywords inside comments and strings", () => {
		const sql =
			"SELECT team, points FROM v_team_season_summary -- DELETE everything\n" +
			"WHERE team <> 'DROP' ORDER BY points DESC LIMIT 1"
		expect(validator.validate(sql, "CLUB_METRIC_SEASON").ok).toBe(true)
	})
})

describe("GuardrailValidator — joins", () => {
	it.each(["JOIN", "join", "\n\tJOIN\n", "LEFT OUTER JOIN", "INNER  JOIN", "CROSS JOIN"])(
		"should reject %j",
		(join) => {
			const sql = `SELECT s.team FROM v_team_season_summary s ${join} pl_season_table t ON t.team = s.team LIMIT 1`
			const v = validator.validate(sql, "CLUB_METRIC_SEASON")
			expect(v.ok).toBe(false)
			expect(v.violatedRule).toBe("JOIN_FORBIDDEN")
		},
	)

	it.each([...INTENT_CATEGORIES])("should reject a JOIN for %s", (category) => {
		const sql = "SELECT s.team FROM v_team_season_summary s JOIN pl_season_table t ON t.team = s.team LIMIT 1"
		expect(validator.validate(sql, category).violatedRule).toBe("JOIN_FORBIDDEN")
	})

	it.each([...INTENT_CATEGORIES])("should reject a comma join for %s", (category) => {
		const sql = "SELECT s.team FROM v_team_season_summary s, pl_season_table t LIMIT 1"
		expect(validator.validate(sql, category).violatedRule).toBe("JOIN_FORBIDDEN")
	})

	it("should reject comma joins", () => {
		const v = validator.validate("SELECT s.team FROM v_team_season_summary s, pl_season_table t LIMIT 1", "CLUB_METRIC_SEASON")
		expect(v.violatedRule).toBe("JOIN_FORBIDDEN")
		expect(v.issues[0].message).toBe("Implicit join: FROM lists more than one relation")
	})

	it("should ignore JOIN inside a comment", () => {
		const sql = "SELECT team, points FROM v_team_season_summary /* JOIN pl_season_table */ ORDER BY points DESC LIMIT 1"
		expect(validator.validate(sql, "CLUB_METRIC_SEASON").ok).toBe(true)
	})

	it("should ignore JOIN inside a string literal", () => {
		const sql = "SELECT team, points FROM v_team_season_summary WHERE team = 'JOIN' ORDER BY points DESC LIMIT 1"
		expect(validator.validate(sql, "CLUB_METRIC_SEASON").ok).toBe(true)
	})
})

describe("GuardrailValidator — allow-lists", () => {
	it("should reject relations outside the catalog", () => {
		const v = validator.validate("SELECT team FROM teams LIMIT 1", "CLUB_METRIC_SEASON")
		expect(v.violatedRule).toBe("RELATION_NOT_ALLOWED")
		expect(v.issues[0].message).toBe("Relations outside the catalog: teams")
	})

	it("should reject a catalog relation under the wrong schema", () => {
		const v = validator.validate("SELECT team FROM stats.v_team_season_summary LIMIT 1", "CLUB_METRIC_SEASON")
		expect(v.issues[0].message).toBe("Relations outside the catalog: stats.v_team_season_summary")
	})

	it("should accept schema-qualified and quoted names", () => {
		const sql = 'SELECT "team", points FROM public."v_team_season_summary" ORDER BY points DESC LIMIT 1'
		expect(validator.validate(sql, "CLUB_METRIC_SEASON").ok).toBe(true)
	})

	it("should reject columns outside the allow-list", () => {
		const v = validator.validate(
			"SELECT team, attendance FROM v_team_season_summary ORDER BY attendance DESC LIMIT 1",
			"CLUB_METRIC_SEASON",
		)
		expect(v.violatedRule).toBe("UNKNOWN_COLUMN")
		expect(v.issues[0].message).toBe("Unknown columns: attendance")
	})

	it("should not mistake aliases, casts and CTE names for columns", () => {
		const sql =
			"WITH best AS (SELECT team, SUM(points) AS total FROM v_team_season_summary GROUP BY team) " +
			"SELECT team, total::numeric FROM best ORDER BY total DESC LIMIT 3"
		const v = validator.validate(sql, "CLUB_METRIC_ALL_TIME")
		expect(v.issues).toEqual([])
	})

	it("should warn when a base table with a preferred view is read", () => {
		const v = validator.validate(
			"SELECT home_team, ft_home_goals FROM pl_matches ORDER BY ft_home_goals DESC LIMIT 1",
			"CLUB_METRIC_SEASON",
		)
		expect(v.ok).toBe(true)
		expect(v.warning).toBe("Base table pl_matches read where view v_team_matches exists")
	})

	it("should point player questions at the squad totals view", () => {
		const v = validator.validate(
			"SELECT player, SUM(goals) AS total_goals FROM pl_player_standard_stats WHERE team = 'Arsenal' " +
				"GROUP BY player ORDER BY total_goals DESC LIMIT 1",
			"PLAYER_FOR_CLUB",
		)
		expect(v.ok).toBe(true)
		expect(v.issues.map((i) => i.rule)).toEqual(["VIEW_PREFERENCE_VIOLATED"])
		expect(v.warning).toBe("Base table pl_player_standard_stats read where view v_player_totals_by_squad exists")
	})
})

describe("GuardrailValidator — category rules", () => {
	it("should reject player views for club metrics", () => {
		const v = validator.validate(
			"SELECT team, SUM(goals) AS total_goals FROM v_player_totals_by_squad GROUP BY team ORDER BY total_goals DESC LIMIT 1",
			"CLUB_METRIC_ALL_TIME",
		)
		expect(v.violatedRule).toBe("PLAYER_VIEW_MISUSE")
	})

	it("should require rank = 1 for titles", () => {
		const v = validator.validate(
			"SELECT team, COUNT(*) AS titles FROM pl_season_table GROUP BY team ORDER BY titles DESC LIMIT 1",
			"CLUB_TITLES",
		)
		expect(v.violatedRule).toBe("TITLE_RANK_FILTER_MISSING")
	})

	it.each(["rank = 1", "1 = rank", "t.rank = 1"])("should accept the title filter %j", (filter) => {
		const sql = `SELECT t.team, COUNT(*) AS titles FROM pl_season_table t WHERE ${filter} GROUP BY t.team ORDER BY titles DESC LIMIT 1`
		expect(validator.validate(sql, "CLUB_TITLES").ok).toBe(true)
	})

	it("should not accept another rank as a title filter", () => {
		const sql = "SELECT team, COUNT(*) AS titles FROM pl_season_table WHERE rank = 2 GROUP BY team LIMIT 1"
		expect(validator.validate(sql, "CLUB_TITLES").violatedRule).toBe("TITLE_RANK_FILTER_MISSING")
	})

	it("should reject streaks computed from raw match rows", () => {
		const v = validator.validate(
			"SELECT home_team, COUNT(*) FROM pl_matches WHERE ft_result = 'H' GROUP BY home_team LIMIT 1",
			"MATCH_CONDITIONAL_CLUB_METRIC",
		)
		expect(v.violatedRule).toBe("RAW_TABLE_FOR_STREAK")
		expect(v.issues.map((i) => i.rule)).toEqual(["VIEW_PREFERENCE_VIOLATED", "RAW_TABLE_FOR_STREAK", "STREAK_VIEW_REQUIRED"])
	})

	it("should require a streak view for streak questions", () => {
		const v = validator.validate(SEASON_SQL, "MATCH_CONDITIONAL_CLUB_METRIC")
		expect(v.violatedRule).toBe("STREAK_VIEW_REQUIRED")
	})

	it("should accept a streak view", () => {
		const sql = "SELECT team, start_date, streak_length FROM v_team_win_streaks ORDER BY streak_length DESC LIMIT 1"
		expect(validator.validate(sql, "MATCH_CONDITIONAL_CLUB_METRIC").ok).toBe(true)
	})
})

describe("GuardrailValidator — limits", () => {
	it("should require a LIMIT", () => {
		const v = validator.validate("SELECT team, points FROM v_team_season_summary", "CLUB_METRIC_SEASON")
		expect(v.violatedRule).toBe("LIMIT_MISSING")
		expect(v.issues[0].message).toBe("Query has no LIMIT clause")
	})

	it("should reject a non-positive LIMIT", () => {
		const v = validator.validate("SELECT team FROM v_team_season_summary LIMIT 0", "CLUB_METRIC_SEASON")
		expect(v.issues[0].message).toBe("LIMIT must be a positive integer literal")
	})

	it("should reject a LIMIT above the maximum", () => {
		const v = validator.validate("SELECT team FROM v_team_season_summary LIMIT 101", "CLUB_METRIC_SEASON")
		expect(v.violatedRule).toBe("LIMIT_EXCEEDED")
		expect(v.issues[0].message).toBe("LIMIT 101 exceeds maximum of 100")
	})

	it("should accept FETCH FIRST", () => {
		expect(
			validator.validate("SELECT team FROM v_team_season_summary FETCH FIRST 5 ROWS ONLY", "CLUB_METRIC_SEASON").ok,
		).toBe(true)
		expect(validator.validate("SELECT team FROM v_team_season_summary FETCH FIRST ROW ONLY", "CLUB_METRIC_SEASON").ok).toBe(
			true,
		)
	})

	it("should not count a LIMIT inside a subquery", () => {
		const sql = "SELECT team, points FROM (SELECT team, points FROM v_team_season_summary LIMIT 5) sub ORDER BY points DESC"
		expect(validator.validate(sql, "CLUB_METRIC_SEASON").violatedRule).toBe("LIMIT_MISSING")
	})
})

describe("compressIssuesForRepair", () => {
	it("should produce one instruction per distinct problem", () => {
		const v = validator.validate(
			"SELECT s.team FROM v_team_season_summary s JOIN pl_season_table t ON t.team = s.team, pl_matches m",
			"CLUB_METRIC_SEASON",
		)
		expect(compressIssuesForRepair(v.issues)).toEqual([
			"Do not join: read only the routed relation",
			"Read from v_team_matches instead",
			"Add a LIMIT clause with a positive integer",
		])
	})
})

describe("formatIssuesForLog", () => {
	it("should render one line per issue", () => {
		const v = validator.validate("SELECT team FROM v_team_season_summary", "CLUB_METRIC_SEASON")
		expect(formatIssuesForLog(v.issues)).toBe("[ERROR] LIMIT_MISSING: Query has no LIMIT clause")
	})
})

import { describe, it, expect, beforeAll } from "vitest"
import { fileURLToPath } from "url"
import { FootballSQLError, RETRY_TOKEN_MARKER } from "./config.js"
import { createEngine } from "./engine.js"
import {
	AnswerQuestionSchema,
	RouteQuestionSchema,
	ValidateSqlSchema,
	handleRouteQuestion,
	handleValidateSql,
	type ServerContext,
} from "./index.js"
import { silentLogger } from "./logger.js"

const CATALOG_DIR = fileURLToPath(new URL("../../config/catalog", import.meta.url))
const QUESTION = "Who scored the most goals for Arsenal?"
const JOINED =
	"SELECT p.player, SUM(p.goals) AS total_goals FROM v_player_totals_by_squad p " +
	"JOIN pl_matches m ON m.home_team = p.team WHERE p.team = 'Arsenal' GROUP BY p.player ORDER BY total_goals DESC LIMIT 1"

let context: ServerContext

beforeAll(() => {
	context = {
		engine: createEngine(CATALOG_DIR, { defaultLimit: 1, maxLimit: 100 }),
		executor: null,
		proposer: null,
		maxAttempts: 3,
		logger: silentLogger,
	}
})

describe("handleRouteQuestion", () => {
	it("should describe the decision and the assembled SQL", () => {
		const res = handleRouteQuestion({ question: QUESTION }, context)
		if (!res.routed) throw new Error(res.retry_reason)

		expect(res.decision.category).toBe("PLAYER_FOR_CLUB")
		expect(res.decision.source).toBe("public.v_player_totals_by_squad")
		expect(res.decision.team).toBe("Arsenal")
		expect(res.decision.limit).toBe(1)
		expect(res.decision.matched_keywords).toEqual(["most goals for"])
		expect(res.sql.split("\n")[0]).toBe("SELECT player, SUM(goals) AS total_goals")
	})

	it("should return the retry token for unroutable questions", () => {
		const res = handleRouteQuestion({ question: "Who is the best?" }, context)
		if (res.routed) throw new Error("expected a retry token")

		expect(res.category).toBe("AMBIGUOUS")
		expect(res.retry_reason).toBe("ambiguous routing: no keyword rule matched")
		expect(res.retry_token.split("\n")[0]).toBe(RETRY_TOKEN_MARKER)
	})

	it("should answer an empty question with a retry token", () => {
		const input = RouteQuestionSchema.parse({ question: "" })
		const res = handleRouteQuestion(input, context)
		if (res.routed) throw new Error("expected a retry token")

		expect(res.category).toBe("AMBIGUOUS")
		expect(res.retry_reason).toBe("ambiguous routing: empty question")
		expect(res.retry_token.split("\n")[0]).toBe(RETRY_TOKEN_MARKER)
	})
})

describe("handleValidateSql", () => {
	it("should validate against the routed decision when given a question", () => {
		const res = handleValidateSql({ sql: JOINED, question: QUESTION }, context)
		if (!res.validated) throw new Error(res.retry_reason)

		expect(res.category).toBe("PLAYER_FOR_CLUB")
		expect(res.verdict.ok).toBe(false)
		expect(res.verdict.violatedRule).toBe("JOIN_FORBIDDEN")
	})

	it("should validate against a bare category", () => {
		const res = handleValidateSql({ sql: "DELETE FROM pl_matches", category: "CLUB_METRIC_SEASON" }, context)
		if (!res.validated) throw new Error(res.retry_reason)

		expect(res.category).toBe("CLUB_METRIC_SEASON")
		expect(res.verdict.violatedRule).toBe("NOT_SELECT_ONLY")
	})

	it("should return a retry token when the question cannot be routed", () => {
		const res = handleValidateSql({ sql: "SELECT 1 LIMIT 1", question: "Who is the best?" }, context)
		expect(res.validated).toBe(false)
	})

	it("should require a category or a question", () => {
		expect(() => handleValidateSql({ sql: "SELECT 1 LIMIT 1" }, context)).toThrow(FootballSQLError)
	})
})

describe("tool schemas", () => {
	it("should reject unknown categories", () => {
		expect(ValidateSqlSchema.safeParse({ sql: "SELECT 1", category: "NOT_A_CATEGORY" }).success).toBe(false)
	})

	it("should default trace to false and reject non-positive max_rows", () => {
		expect(AnswerQuestionSchema.parse({ question: QUESTION }).trace).toBe(false)
		expect(AnswerQuestionSchema.safeParse({ question: QUESTION, max_rows: 0 }).success).toBe(false)
		expect(AnswerQuestionSchema.safeParse({ question: "" }).success).toBe(true)
	})
})

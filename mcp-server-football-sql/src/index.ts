/**
 * Football SQL MCP Server
 *
 * Tools:
 * - route_question: classify + route + assemble, no execution
 * - validate_sql: run the guardrails over caller-supplied SQL
 * - answer_question: full attempt loop with execution
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { z } from "zod"
import { INTENT_CATEGORIES, type RoutingDecision } from "./catalog_types.js"
import { qualifiedName } from "./catalog.js"
import { FootballSQLError } from "./config.js"
import type { RoutingEngine } from "./engine.js"
import type { Logger } from "./logger.js"
import type { SqlExecutor } from "./pg_executor.js"
import { answerQuestion } from "./question_tool.js"
import { formatRetryToken } from "./retry_controller.js"
import type { SqlProposer } from "./sidecar_client.js"

export const SERVER_NAME = "football-sql"
export const SERVER_VERSION = "0.1.0"

// ============================================================================
// Tool Schemas
// ============================================================================

export const RouteQuestionSchema = z.object({
	question: z.string().describe("Natural-language football statistics question"),
})

export const ValidateSqlSchema = z.object({
	sql: z.string().describe("SQL to check against the guardrails"),
	category: z
		.enum(INTENT_CATEGORIES)
		.optional()
		.describe("Intent category to validate against (category rules only)"),
	question: z
		.string()
		.min(1)
		.optional()
		.describe("Route this question and validate against its decision (all rules)"),
})

export const AnswerQuestionSchema = z.object({
	question: z.string().describe("Natural-language football statistics question"),
	max_rows: z.number().int().positive().optional().describe("Rows to return (capped by the server maximum)"),
	trace: z.boolean().default(false).describe("Include timings and guardrail issues"),
})

export type RouteQuestionInput = z.infer<typeof RouteQuestionSchema>
export type ValidateSqlInput = z.infer<typeof ValidateSqlSchema>
export type AnswerQuestionInput = z.infer<typeof AnswerQuestionSchema>

// ============================================================================
// Handlers
// ============================================================================

export interface ServerContext {
	engine: RoutingEngine
	executor: SqlExecutor | null
	proposer: SqlProposer | null
	maxAttempts: number
	logger: Logger
}

export function describeDecision(decision: RoutingDecision) {
	return {
		category: decision.category,
		source: qualifiedName(decision.source),
		metric: decision.metric,
		aggregate: decision.aggregate,
		constraints: decision.constraints,
		projection: decision.projection,
		team: decision.team,
		limit: decision.limit,
		matched_keywords: decision.matchedKeywords,
	}
}

export function handleRouteQuestion(input: RouteQuestionInput, context: ServerContext) {
	const outcome = context.engine.classifyAndRoute(input.question)
	if (!outcome.ok) {
		return {
			routed: false as const,
			category: outcome.token.category,
			retry_reason: outcome.token.reason,
			retry_token: formatRetryToken(outcome.token),
		}
	}
	return {
		routed: true as const,
		decision: describeDecision(outcome.decision),
		sql: context.engine.assemble(outcome.decision),
	}
}

export function handleValidateSql(input: ValidateSqlInput, context: ServerContext) {
	const { engine } = context
	if (input.question !== undefined) {
		const outcome = engine.classifyAndRoute(input.question)
		if (!outcome.ok) {
			return {
				validated: false as const,
				retry_reason: outcome.token.reason,
				retry_token: formatRetryToken(outcome.token),
			}
		}
		return { validated: true as const, category: outcome.decision.category, verdict: engine.validate(input.sql, outcome.decision) }
	}
	if (input.category !== undefined) {
		return { validated: true as const, category: input.category, verdict: engine.validate(input.sql, input.category) }
	}
	throw new FootballSQLError("config", "validate_sql needs either category or question", true)
}

// ============================================================================
// Server
// ============================================================================

function textResult(value: unknown) {
	return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] }
}

function errorResult(error: unknown, logger: Logger, tool: string) {
	const message = error instanceof Error ? error.message : String(error)
	logger.error("Tool failed", { tool, error: message })
	const payload =
		error instanceof FootballSQLError
			? { type: error.type, message, recoverable: error.recoverable }
			: { type: "internal", message, recoverable: false }
	return { ...textResult({ error: payload }), isError: true }
}

export default function createServer(context: ServerContext): McpServer {
	const { logger } = context
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })

	server.tool(
		"route_question",
		"Classify a football question and show the routed source, metric and assembled SQL without running it.",
		RouteQuestionSchema.shape,
		async (args) => {
			try {
				return textResult(handleRouteQuestion(args, context))
			} catch (error) {
				return errorResult(error, logger, "route_question")
			}
		},
	)

	server.tool(
		"validate_sql",
		"Check SQL against the read-only, single-source and category guardrails. Pass a category, or a question to validate against its routing decision.",
		ValidateSqlSchema.shape,
		async (args) => {
			try {
				return textResult(handleValidateSql(args, context))
			} catch (error) {
				return errorResult(error, logger, "validate_sql")
			}
		},
	)

	server.tool(
		"answer_question",
		"Answer a football statistics question from the curated views. Returns rows, or a retry token when the question cannot be answered safely.",
		AnswerQuestionSchema.shape,
		async (args) => {
			try {
				return textResult(await answerQuestion(args, context))
			} catch (error) {
				return errorResult(error, logger, "answer_question")
			}
		},
	)

	logger.info("Registered tools", { tools: ["route_question", "validate_sql", "answer_question"] })
	return server
}

/**
 * Question Tool (orchestrator)
 *
 * Owns the bounded attempt loop around the pure routing engine:
 *
 * 1. Route once. A retry token here is final (routing is deterministic).
 * 2. For each attempt, take a candidate: a sidecar proposal while the
 *    sidecar is configured and reachable, the assembled SQL otherwise. The
 *    last attempt always falls back to the assembled SQL.
 * 3. Validate every candidate and record the verdict with the controller.
 * 4. Execute only accepted SQL. On exhaustion return the token, no rows.
 */

import { v4 as uuidv4 } from "uuid"
import type { GuardrailIssue, RoutingDecision, ValidationVerdict } from "./catalog_types.js"
import { qualifiedName } from "./catalog.js"
import { FootballSQLError, type QuestionRequest, type QuestionResponse } from "./config.js"
import type { RoutingEngine } from "./engine.js"
import { compressIssuesForRepair } from "./guardrail_validator.js"
import type { Logger } from "./logger.js"
import type { SqlExecutor } from "./pg_executor.js"
import { sqlLiteral } from "./query_assembler.js"
import { RetryController, formatRetryToken } from "./retry_controller.js"
import type { SqlProposer } from "./sidecar_client.js"

export interface QuestionToolContext {
	engine: RoutingEngine
	/** null runs validation only (nothing is executed) */
	executor: SqlExecutor | null
	/** null always uses the assembled SQL */
	proposer: SqlProposer | null
	maxAttempts: number
	logger: Logger
}

/**
 * Routing hint sent to the sidecar: everything the proposal must respect
 */
export function formatRoutingHint(decision: RoutingDecision): string {
	const constraints = decision.constraints.map((c) =>
		c.kind === "where" ? `${c.column} = ${sqlLiteral(c.value)}` : `GROUP BY ${c.columns.join(", ")}`,
	)
	const metric = decision.aggregate
		? `${decision.aggregate.fn}(${decision.aggregate.argument}) AS ${decision.aggregate.alias}`
		: decision.metric.column
	const orderKey = decision.aggregate ? decision.aggregate.alias : decision.metric.column
	return [
		`CATEGORY: ${decision.category}`,
		`SOURCE: ${qualifiedName(decision.source)} (the only relation you may read; no joins)`,
		`COLUMNS: ${decision.source.allowedColumns.join(", ")}`,
		`METRIC: ${metric}`,
		`CONSTRAINTS: ${constraints.length > 0 ? constraints.join("; ") : "none"}`,
		`ORDER BY: ${orderKey} ${decision.metric.direction} NULLS LAST`,
		`LIMIT: ${decision.limit}`,
	].join("\n")
}

function withLimit(decision: RoutingDecision, limit: number | undefined): RoutingDecision {
	if (limit === undefined || limit === decision.limit) return decision
	return Object.freeze({ ...decision, limit })
}

/**
 * Answer one question end to end
 */
export async function answerQuestion(input: QuestionRequest, context: QuestionToolContext): Promise<QuestionResponse> {
	const startTime = Date.now()
	const queryId = uuidv4()
	const { question, trace = false } = input
	const { engine, executor, proposer, logger } = context
	const maxAttempts = Math.max(1, context.maxAttempts)

	logger.info("Question received", { query_id: queryId, question, max_attempts: maxAttempts })

	const controller = new RetryController()
	const warnings: string[] = []

	// === ROUTING ===
	const routingStart = Date.now()
	const outcome = engine.classifyAndRoute(question)
	const routingMs = Date.now() - routingStart
	controller.recordRouting(outcome)

	if (!outcome.ok) {
		const token = controller.exhaust()
		logger.info("Routing produced retry token", { query_id: queryId, kind: token.kind, reason: token.reason })
		const response: QuestionResponse = {
			query_id: queryId,
			question,
			category: token.category,
			accepted: false,
			attempts: 0,
			retry_token: formatRetryToken(token),
			retry_reason: token.reason,
			warnings,
			executed: false,
		}
		if (trace) {
			response.trace = {
				routing_ms: routingMs,
				validation_ms: 0,
				execution_ms: 0,
				total_ms: Date.now() - startTime,
				matched_keywords: [],
				issues: [],
			}
		}
		return response
	}

	const decision = withLimit(outcome.decision, input.max_rows)
	const assembled = engine.assemble(decision)
	const routingHint = formatRoutingHint(decision)

	logger.debug("Question routed", {
		query_id: queryId,
		category: decision.category,
		source: qualifiedName(decision.source),
		metric: decision.metric.column,
		direction: decision.metric.direction,
	})

	// === ATTEMPT LOOP ===
	let validationMs = 0
	let attempts = 0
	let sidecarUp = proposer !== null
	let assembledTried = false
	let candidate = ""
	let candidateSource: "assembled" | "proposed" = "assembled"
	let verdict: ValidationVerdict | null = null
	let repairInstructions: string[] = []
	const issues: GuardrailIssue[] = []

	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		const finalFallback = attempt === maxAttempts && maxAttempts > 1
		let proposed: string | null = null

		if (proposer !== null && sidecarUp && !finalFallback) {
			try {
				proposed = await proposer.proposeSQL({
					question,
					routing_hint: routingHint,
					attempt,
					previous_sql: attempt > 1 ? candidate : undefined,
					repair_instructions: repairInstructions.length > 0 ? repairInstructions : undefined,
				})
			} catch (error) {
				if (!(error instanceof FootballSQLError)) throw error
				sidecarUp = false
				warnings.push(`SQL proposal failed: ${error.message}`)
				logger.warn("Sidecar proposal failed, using assembled SQL", {
					query_id: queryId,
					attempt,
					error: error.message,
				})
			}
		}

		if (proposed === null) {
			if (assembledTried) break
			assembledTried = true
			candidate = assembled
			candidateSource = "assembled"
		} else {
			candidate = proposed
			candidateSource = "proposed"
		}
		attempts = attempt

		const validationStart = Date.now()
		verdict = engine.validate(candidate, decision)
		validationMs += Date.now() - validationStart
		issues.push(...verdict.issues)

		const token = controller.recordVerdict(decision, verdict, question)
		if (token === null) {
			logger.info("Candidate accepted", { query_id: queryId, attempt, sql_source: candidateSource })
			break
		}

		repairInstructions = compressIssuesForRepair(verdict.issues)
		logger.info("Candidate rejected", {
			query_id: queryId,
			attempt,
			sql_source: candidateSource,
			rule: token.rule,
		})
	}

	const base = {
		query_id: queryId,
		question,
		category: decision.category,
		sql: candidate,
		sql_source: candidateSource,
		attempts,
		warnings,
	}
	const buildTrace = (executionMs: number): QuestionResponse["trace"] =>
		trace
			? {
					routing_ms: routingMs,
					validation_ms: validationMs,
					execution_ms: executionMs,
					total_ms: Date.now() - startTime,
					matched_keywords: [...decision.matchedKeywords],
					source: qualifiedName(decision.source),
					issues,
				}
			: undefined

	if (controller.state !== "ACCEPTED" || verdict === null) {
		const token = controller.exhaust()
		logger.info("Attempts exhausted", { query_id: queryId, attempts, reason: token.reason })
		return {
			...base,
			accepted: false,
			retry_token: formatRetryToken(token),
			retry_reason: token.reason,
			executed: false,
			trace: buildTrace(0),
		}
	}

	for (const i of verdict.issues) {
		if (i.severity === "warning") warnings.push(i.message)
	}

	// === EXECUTION ===
	if (executor === null) {
		return { ...base, accepted: true, executed: false, trace: buildTrace(0) }
	}

	try {
		const result = await executor.execute(candidate)
		logger.info("Question answered", {
			query_id: queryId,
			rows: result.rows.length,
			total_ms: Date.now() - startTime,
		})
		return {
			...base,
			accepted: true,
			executed: true,
			columns: result.columns,
			rows: result.rows,
			execution_time_ms: result.executionTimeMs,
			trace: buildTrace(result.executionTimeMs),
		}
	} catch (error) {
		if (!(error instanceof FootballSQLError)) throw error
		logger.error("Execution failed", { query_id: queryId, error: error.message })
		return {
			...base,
			accepted: true,
			executed: false,
			error: { type: error.type, message: error.message, recoverable: error.recoverable },
			trace: buildTrace(0),
		}
	}
}

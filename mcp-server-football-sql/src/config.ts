/**
 * Shared types and constants for the Football SQL MCP Server
 *
 * Includes:
 * - Sidecar wire types (SQL proposal requests/responses)
 * - Question tool request/response interfaces
 * - Structured error class
 * - Defaults
 */

import type { GuardrailIssue, IntentCategory } from "./catalog_types.js"

/**
 * Retry token marker line, surfaced verbatim to end users and traces
 */
export const RETRY_TOKEN_MARKER = "<<NEED_SCHEMA_OR_CLARIFICATION_RETRY>>"

/**
 * Sidecar endpoints (relative to sidecar.url)
 */
export const SIDECAR_ENDPOINTS = {
	generateSQL: "/generate_sql",
	health: "/health",
}

/**
 * Request to the sidecar for an SQL proposal
 */
export interface ProposeSQLRequest {
	/** Original natural language question */
	question: string

	/** Routing hint rendered from the RoutingDecision */
	routing_hint: string

	/** Current attempt number (1-based) */
	attempt: number

	/** Previous SQL that failed validation, if any */
	previous_sql?: string

	/** Short repair instructions derived from guardrail issues */
	repair_instructions?: string[]
}

/**
 * Response from the sidecar
 */
export interface ProposeSQLResponse {
	sql: string
	notes?: string
}

/**
 * Input to the answer_question tool
 */
export interface QuestionRequest {
	question: string
	/** Overrides the routed row count, still subject to engine.max_limit */
	max_rows?: number
	trace?: boolean
}

/**
 * Final response for one question
 */
export interface QuestionResponse {
	query_id: string
	question: string
	category: IntentCategory

	/** SQL that was accepted and executed, or the last rejected candidate */
	sql?: string
	sql_source?: "assembled" | "proposed"
	accepted: boolean
	attempts: number

	/** Rendered retry token when no SQL was accepted */
	retry_token?: string
	retry_reason?: string

	warnings: string[]

	executed: boolean
	columns?: string[]
	rows?: Record<string, unknown>[]
	execution_time_ms?: number

	trace?: {
		routing_ms: number
		validation_ms: number
		execution_ms: number
		total_ms: number
		matched_keywords: string[]
		source?: string
		issues: GuardrailIssue[]
	}

	error?: {
		type: FootballSQLErrorType
		message: string
		recoverable: boolean
	}
}

export type FootballSQLErrorType = "catalog" | "config" | "transition" | "generation" | "execution"

/**
 * Error types for structured error handling
 */
export class FootballSQLError extends Error {
	constructor(
		public type: FootballSQLErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "FootballSQLError"
	}
}

/**
 * Default configuration values
 */
export const DEFAULTS = {
	defaultLimit: 1,
	maxLimit: 100,
	maxAttempts: 3,
	statementTimeoutMs: 5000,
	sidecarTimeoutMs: 30000,
}

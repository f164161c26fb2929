/**
 * SQL Sidecar HTTP Client
 *
 * Asks the language-model sidecar to propose SQL for a routed question.
 * Proposals are untrusted: the caller validates every one with the
 * guardrail validator before it can run.
 *
 * Responsibilities:
 * - POST question + routing hint (+ repair instructions) to /generate_sql
 * - Timeouts via AbortController
 * - Circuit breaker on connection failures, reset by a health check
 */

import { z } from "zod"
import { FootballSQLError, SIDECAR_ENDPOINTS, type ProposeSQLRequest, type ProposeSQLResponse } from "./config.js"

/**
 * Anything that can propose SQL text for a question
 */
export interface SqlProposer {
	proposeSQL(request: ProposeSQLRequest): Promise<string>
}

const proposeResponseSchema: z.ZodType<ProposeSQLResponse> = z.object({
	sql: z.string().min(1),
	notes: z.string().optional(),
})

export interface SidecarClientOptions {
	baseUrl: string
	timeoutMs: number
}

export class SidecarClient implements SqlProposer {
	private readonly baseUrl: string
	private readonly timeout: number
	private isHealthy: boolean = true

	constructor(options: SidecarClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "")
		this.timeout = options.timeoutMs
	}

	/**
	 * Request one SQL proposal
	 */
	async proposeSQL(request: ProposeSQLRequest): Promise<string> {
		// Circuit breaker: fail fast until a health check succeeds
		if (!this.isHealthy) {
			throw new FootballSQLError("generation", "SQL sidecar is unavailable", true, { baseUrl: this.baseUrl })
		}

		const url = `${this.baseUrl}${SIDECAR_ENDPOINTS.generateSQL}`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), this.timeout)

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					Accept: "application/json",
				},
				body: JSON.stringify(request),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new FootballSQLError(
					"generation",
					`SQL sidecar returned error: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, responseBody: errorText },
				)
			}

			const parsed = proposeResponseSchema.safeParse(await response.json())
			if (!parsed.success) {
				throw new FootballSQLError("generation", "SQL sidecar response has no sql field", true, {
					issues: parsed.error.issues.map((i) => i.message),
				})
			}
			return parsed.data.sql
		} catch (error) {
			if (error instanceof FootballSQLError) {
				throw error
			}

			if (error instanceof Error && error.name === "AbortError") {
				throw new FootballSQLError("generation", `SQL sidecar request timed out after ${this.timeout}ms`, true, {
					timeout: this.timeout,
					url,
				})
			}

			// fetch rejects with TypeError when the connection fails
			if (error instanceof TypeError) {
				this.isHealthy = false
				throw new FootballSQLError("generation", `Cannot connect to SQL sidecar at ${this.baseUrl}`, true, {
					baseUrl: this.baseUrl,
					originalError: error.message,
				})
			}

			throw new FootballSQLError("generation", `Unexpected error from SQL sidecar: ${String(error)}`, false, {
				originalError: String(error),
			})
		} finally {
			clearTimeout(timeoutId)
		}
	}

	/**
	 * Probe /health; a success closes the circuit breaker
	 */
	async healthCheck(): Promise<boolean> {
		try {
			const response = await fetch(`${this.baseUrl}${SIDECAR_ENDPOINTS.health}`, {
				method: "GET",
				signal: AbortSignal.timeout(5000),
			})
			this.isHealthy = response.ok
		} catch {
			this.isHealthy = false
		}
		return this.isHealthy
	}

	get healthy(): boolean {
		return this.isHealthy
	}
}

/**
 * Postgres Execution
 *
 * Runs SQL that the guardrail validator has accepted. Each query gets its own
 * pooled connection with a statement timeout; rows come back as plain
 * objects together with the column order.
 */

import pg from "pg"
import type { Pool as PgPool } from "pg"
import { FootballSQLError } from "./config.js"
import type { Logger } from "./logger.js"

const { Pool } = pg

// ============================================================================
// Types
// ============================================================================

export interface QueryResultLike {
	rows: Record<string, unknown>[]
	fields?: { name: string }[]
}

/** The slice of pg.PoolClient this module uses */
export interface PooledConnection {
	query(text: string, values?: unknown[]): Promise<QueryResultLike>
	release(): void
}

/** The slice of pg.Pool this module uses */
export interface ConnectionPool {
	connect(): Promise<PooledConnection>
	end(): Promise<void>
}

export interface ExecutionResult {
	columns: string[]
	rows: Record<string, unknown>[]
	executionTimeMs: number
}

export interface SqlExecutor {
	execute(sql: string): Promise<ExecutionResult>
}

export interface DatabaseSettings {
	host: string
	port: number
	name: string
	user: string
	password: string
	max_connections: number
}

// ============================================================================
// Pool
// ============================================================================

export function createPool(db: DatabaseSettings): PgPool {
	return new Pool({
		host: db.host,
		port: db.port,
		database: db.name,
		user: db.user,
		password: db.password,
		max: db.max_connections,
	})
}

// ============================================================================
// Executor
// ============================================================================

/** Postgres SQLSTATE for query_canceled (statement_timeout) */
const QUERY_CANCELED = "57014"

function sqlState(error: unknown): string | null {
	if (error !== null && typeof error === "object" && "code" in error && typeof error.code === "string") {
		return error.code
	}
	return null
}

export class PgExecutor implements SqlExecutor {
	constructor(
		private readonly pool: ConnectionPool,
		private readonly statementTimeoutMs: number,
		private readonly logger: Logger,
	) {}

	async execute(sql: string): Promise<ExecutionResult> {
		let client: PooledConnection | null = null
		try {
			client = await this.pool.connect()
			await client.query(`SET statement_timeout = ${Math.floor(this.statementTimeoutMs)}`)

			const start = Date.now()
			const result = await client.query(sql)
			const executionTimeMs = Date.now() - start

			const columns = result.fields
				? result.fields.map((f) => f.name)
				: Object.keys(result.rows[0] ?? {})

			this.logger.debug("Query executed", { rows: result.rows.length, execution_time_ms: executionTimeMs })
			return { columns, rows: result.rows, executionTimeMs }
		} catch (error) {
			const state = sqlState(error)
			const message = error instanceof Error ? error.message : String(error)
			if (state === QUERY_CANCELED) {
				throw new FootballSQLError("execution", `Query exceeded statement timeout of ${this.statementTimeoutMs}ms`, true, {
					sqlState: state,
				})
			}
			throw new FootballSQLError("execution", `Query failed: ${message}`, false, { sqlState: state })
		} finally {
			client?.release()
		}
	}
}

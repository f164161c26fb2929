/**
 * Query Assembler
 *
 * Renders a RoutingDecision as SQL:
 *
 *   SELECT <projection>, <metric | AGG(metric) AS alias>
 *   FROM <schema>.<relation>
 *   [WHERE a AND b]
 *   [GROUP BY ...]
 *   ORDER BY <metric | alias> <direction> NULLS LAST
 *   LIMIT <n>
 *
 * Identifiers come from the catalog; only WHERE values are literals.
 */

import type { RoutingDecision, StructuralConstraint } from "./catalog_types.js"
import { qualifiedName } from "./catalog.js"

/**
 * SQL literal for a constraint value ('' escaping for strings)
 */
export function sqlLiteral(value: string | number): string {
	if (typeof value === "number") {
		return String(value)
	}
	return `'${value.replace(/'/g, "''")}'`
}

function whereClause(constraints: readonly StructuralConstraint[]): string | null {
	const conditions: string[] = []
	for (const c of constraints) {
		if (c.kind === "where") {
			conditions.push(`${c.column} = ${sqlLiteral(c.value)}`)
		}
	}
	return conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : null
}

function groupByClause(constraints: readonly StructuralConstraint[]): string | null {
	const columns: string[] = []
	for (const c of constraints) {
		if (c.kind === "group_by") {
			for (const col of c.columns) {
				if (!columns.includes(col)) columns.push(col)
			}
		}
	}
	return columns.length > 0 ? `GROUP BY ${columns.join(", ")}` : null
}

export function assembleQuery(decision: RoutingDecision): string {
	const { aggregate, metric } = decision

	const metricExpr = aggregate ? `${aggregate.fn}(${aggregate.argument}) AS ${aggregate.alias}` : metric.column
	const orderKey = aggregate ? aggregate.alias : metric.column

	const lines: (string | null)[] = [
		`SELECT ${[...decision.projection, metricExpr].join(", ")}`,
		`FROM ${qualifiedName(decision.source)}`,
		whereClause(decision.constraints),
		groupByClause(decision.constraints),
		`ORDER BY ${orderKey} ${metric.direction} NULLS LAST`,
		`LIMIT ${decision.limit}`,
	]
	return lines.filter((line): line is string => line !== null).join("\n")
}

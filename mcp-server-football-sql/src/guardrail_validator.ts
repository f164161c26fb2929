/**
 * Guardrail Validator
 *
 * Decides whether a candidate SQL string (assembled or proposed by the
 * sidecar) may run. Checks, all independent, in this order:
 *
 * 1. Single read-only statement       NOT_SELECT_ONLY, DANGEROUS_FUNCTION
 * 2. No joins (explicit or comma)     JOIN_FORBIDDEN
 * 3. Catalog allow-lists              RELATION_NOT_ALLOWED, UNKNOWN_COLUMN,
 *                                     VIEW_PREFERENCE_VIOLATED (warning)
 * 4. Category guardrails              PLAYER_VIEW_MISUSE, TITLE_RANK_FILTER_MISSING,
 *                                     RAW_TABLE_FOR_STREAK, STREAK_VIEW_REQUIRED,
 *                                     SOURCE_MISMATCH (warning)
 * 5. Row limit                        LIMIT_MISSING, LIMIT_EXCEEDED
 *
 * The validator never rewrites SQL. Repair is left to the proposer, which
 * receives compressIssuesForRepair() output on its next attempt.
 */

import type {
	GuardrailIssue,
	GuardrailRule,
	IntentCategory,
	RelationRef,
	RoutingDecision,
	ValidationVerdict,
} from "./catalog_types.js"
import { findRelation, type Catalog } from "./catalog.js"
import { isSymbol, isWord, lexSQL, parenStructure, type Lexeme, type ParenStructure } from "./sql_tokens.js"

export interface GuardrailOptions {
	maxLimit: number
}

/**
 * Statement keywords that never belong in a read-only query
 */
const DANGEROUS_KEYWORDS = new Set([
	// DDL
	"DROP",
	"CREATE",
	"ALTER",
	"TRUNCATE",
	"RENAME",
	"COMMENT",
	// DML
	"INSERT",
	"UPDATE",
	"DELETE",
	"MERGE",
	"INTO",
	// DCL
	"GRANT",
	"REVOKE",
	// TCL
	"BEGIN",
	"COMMIT",
	"ROLLBACK",
	"SAVEPOINT",
	// Session and maintenance
	"SET",
	"RESET",
	"COPY",
	"EXECUTE",
	"PREPARE",
	"CALL",
	"LOCK",
	"VACUUM",
	"REINDEX",
	"CLUSTER",
	"REFRESH",
	"LISTEN",
	"NOTIFY",
])

/**
 * Functions a query may call. Anything else (query_to_xml, nextval, dblink,
 * pg_sleep, ...) can run SQL text, touch state or reach outside the database.
 */
const ALLOWED_FUNCTIONS = new Set([
	// Aggregates
	"count", "sum", "avg", "min", "max", "string_agg", "bool_and", "bool_or",
	// Window
	"row_number", "rank", "dense_rank", "percent_rank", "ntile", "lag", "lead",
	"first_value", "last_value",
	// Scalar
	"coalesce", "nullif", "greatest", "least", "round", "abs", "ceil", "floor",
	"trunc", "extract", "date_part", "lower", "upper", "length", "trim",
])

/**
 * Words that are never column references
 */
const SQL_KEYWORDS = new Set([
	"SELECT", "FROM", "WHERE", "AND", "OR", "NOT", "IN", "IS", "NULL", "AS", "ON",
	"GROUP", "BY", "ORDER", "HAVING", "LIMIT", "OFFSET", "FETCH", "FIRST", "NEXT",
	"ROW", "ROWS", "ONLY", "ASC", "DESC", "NULLS", "LAST", "DISTINCT", "ALL", "ANY",
	"SOME", "EXISTS", "BETWEEN", "LIKE", "ILIKE", "SIMILAR", "TO", "ESCAPE", "CASE",
	"WHEN", "THEN", "ELSE", "END", "UNION", "INTERSECT", "EXCEPT", "WITH", "RECURSIVE",
	"MATERIALIZED", "CAST", "TRUE", "FALSE", "UNKNOWN", "INTERVAL", "OVER", "PARTITION",
	"WINDOW", "RANGE", "GROUPS", "PRECEDING", "FOLLOWING", "UNBOUNDED", "CURRENT",
	"FILTER", "WITHIN", "LATERAL", "JOIN", "INNER", "LEFT", "RIGHT", "FULL", "OUTER",
	"CROSS", "NATURAL", "USING", "COLLATE", "ARRAY", "AT", "TIME", "ZONE", "BOTH",
	"LEADING", "TRAILING", "FOR", "VALUES", "DEFAULT", "SYMMETRIC", "ASYMMETRIC",
	"OF", "TIES",
	// Date/time fields
	"YEAR", "MONTH", "DAY", "HOUR", "MINUTE", "SECOND", "EPOCH", "DOW", "DOY", "WEEK",
	"QUARTER", "CENTURY", "DECADE",
	// Niladic functions
	"CURRENT_DATE", "CURRENT_TIME", "CURRENT_TIMESTAMP", "LOCALTIME", "LOCALTIMESTAMP",
	// Types
	"INT", "INTEGER", "BIGINT", "SMALLINT", "NUMERIC", "DECIMAL", "REAL", "DOUBLE",
	"PRECISION", "FLOAT", "TEXT", "VARCHAR", "CHAR", "CHARACTER", "VARYING", "BOOLEAN",
	"BOOL", "DATE", "TIMESTAMP", "TIMESTAMPTZ", "TIMETZ", "JSON", "JSONB", "UUID",
])

/**
 * Words that end a FROM list at its own nesting level
 */
const FROM_TERMINATORS = new Set([
	"where", "group", "having", "order", "limit", "offset", "fetch", "union",
	"intersect", "except", "window", "for", "returning",
])

const CLUB_METRIC_CATEGORIES: readonly IntentCategory[] = ["CLUB_METRIC_SEASON", "CLUB_METRIC_ALL_TIME"]

// ============================================================================
// Query structure
// ============================================================================

interface RelationReference {
	schema: string | null
	name: string
	/** Identifier was followed by "(" (table function) */
	isFunction: boolean
}

interface QueryShape {
	lexemes: Lexeme[]
	parens: ParenStructure
	relations: RelationReference[]
	cteNames: Set<string>
	aliases: Set<string>
	/** Lexeme indexes already accounted for (relation names, aliases, CTE names) */
	consumed: Set<number>
	commaJoin: boolean
	joinWords: number
}

function isIdentifier(lex: Lexeme | undefined): lex is Lexeme {
	return lex !== undefined && (lex.kind === "quoted" || (lex.kind === "word" && !isReserved(lex.value)))
}

function isReserved(word: string): boolean {
	const upper = word.toUpperCase()
	return SQL_KEYWORDS.has(upper) || DANGEROUS_KEYWORDS.has(upper)
}

/**
 * Parse one FROM/JOIN item starting at index i; returns the index after it
 */
function parseFromItem(shape: QueryShape, i: number): number {
	const { lexemes, parens } = shape
	if (isWord(lexemes[i], "lateral", "only")) i++

	const head = lexemes[i]
	if (isSymbol(head, "(")) {
		// Derived table; its own FROM lists are found by the outer scan
		i = parens.partner[i] === -1 ? lexemes.length : parens.partner[i] + 1
	} else if (isIdentifier(head)) {
		const parts: number[] = [i]
		i++
		while (isSymbol(lexemes[i], ".") && isIdentifier(lexemes[i + 1])) {
			parts.push(i + 1)
			i += 2
		}
		const isFunction = isSymbol(lexemes[i], "(")
		if (isFunction) {
			i = parens.partner[i] === -1 ? lexemes.length : parens.partner[i] + 1
		}
		const names = parts.map((p) => lexemes[p].value)
		for (const p of parts) shape.consumed.add(p)
		shape.relations.push({
			schema: names.length > 1 ? names[names.length - 2] : null,
			name: names[names.length - 1],
			isFunction,
		})
	} else {
		return i
	}

	// Optional alias
	if (isWord(lexemes[i], "as") && isIdentifier(lexemes[i + 1])) {
		shape.aliases.add(lexemes[i + 1].value)
		shape.consumed.add(i + 1)
		i += 2
	} else if (isIdentifier(lexemes[i])) {
		shape.aliases.add(lexemes[i].value)
		shape.consumed.add(i)
		i++
	}
	return i
}

/**
 * Walk a FROM list that starts after the FROM keyword at index `from`
 */
function parseFromList(shape: QueryShape, from: number): void {
	const { lexemes, parens } = shape
	const level = parens.depth[from]
	let i = parseFromItem(shape, from + 1)

	while (i < lexemes.length) {
		const lex = lexemes[i]
		const depth = parens.depth[i]
		if (depth < level) return
		if (depth > level) {
			i++
			continue
		}
		if (isSymbol(lex, ";")) return
		if (lex.kind === "word" && FROM_TERMINATORS.has(lex.value)) return
		if (isSymbol(lex, ",")) {
			shape.commaJoin = true
			i = parseFromItem(shape, i + 1)
			continue
		}
		if (isWord(lex, "join")) {
			i = parseFromItem(shape, i + 1)
			continue
		}
		i++
	}
}

/**
 * Index of the identifier a "name AS (" CTE header declares, if i is such an AS
 */
function cteNameBefore(lexemes: readonly Lexeme[], parens: ParenStructure, asIndex: number): number | null {
	const after = lexemes[asIndex + 1]
	if (!isSymbol(after, "(") && !isWord(after, "materialized", "not")) return null
	let p = asIndex - 1
	if (isSymbol(lexemes[p], ")")) {
		const open = parens.partner[p]
		if (open === -1) return null
		p = open - 1
	}
	const before = lexemes[p - 1]
	if (!isIdentifier(lexemes[p])) return null
	if (!isWord(before, "with", "recursive") && !isSymbol(before, ",")) return null
	return p
}

function analyzeQuery(lexemes: Lexeme[]): QueryShape {
	const parens = parenStructure(lexemes)
	const shape: QueryShape = {
		lexemes,
		parens,
		relations: [],
		cteNames: new Set(),
		aliases: new Set(),
		consumed: new Set(),
		commaJoin: false,
		joinWords: 0,
	}

	lexemes.forEach((lex, i) => {
		if (isWord(lex, "join")) shape.joinWords++

		if (isWord(lex, "as")) {
			const cte = cteNameBefore(lexemes, parens, i)
			if (cte !== null) {
				shape.cteNames.add(lexemes[cte].value)
				shape.consumed.add(cte)
				// Optional column list: name (a, b) AS (...)
				if (isSymbol(lexemes[i - 1], ")")) {
					for (let k = parens.partner[i - 1] + 1; k < i - 1; k++) {
						if (isIdentifier(lexemes[k])) {
							shape.aliases.add(lexemes[k].value)
							shape.consumed.add(k)
						}
					}
				}
			} else if (isIdentifier(lexemes[i + 1])) {
				shape.aliases.add(lexemes[i + 1].value)
				shape.consumed.add(i + 1)
			}
		}

		// FROM inside EXTRACT(... FROM ...) or IS DISTINCT FROM is not a relation list
		if (isWord(lex, "from") && parens.queryScope[i] && !isWord(lexemes[i - 1], "distinct")) {
			parseFromList(shape, i)
		}
	})

	return shape
}

/** A non-reserved name directly followed by "(", other than a CTE column list */
function isFunctionCall(shape: QueryShape, i: number): boolean {
	const lex = shape.lexemes[i]
	return isIdentifier(lex) && isSymbol(shape.lexemes[i + 1], "(") && !shape.cteNames.has(lex.value)
}

/**
 * Column-like identifiers: not keywords, not function names, not qualifiers,
 * not type names after "::", not typed-literal prefixes, not aliases.
 */
function columnReferences(shape: QueryShape): string[] {
	const { lexemes } = shape
	const columns: string[] = []

	lexemes.forEach((lex, i) => {
		if (!isIdentifier(lex) || shape.consumed.has(i)) return
		const prev = lexemes[i - 1]
		const next = lexemes[i + 1]
		if (isSymbol(next, "(") || isSymbol(next, ".")) return
		if (isSymbol(prev, "::")) return
		if (next !== undefined && next.kind === "string") return
		// Implicit alias: identifier directly after an expression
		if (
			prev !== undefined &&
			(prev.kind === "number" || prev.kind === "string" || isSymbol(prev, ")") || isWord(prev, "end") || isIdentifier(prev))
		) {
			shape.aliases.add(lex.value)
			return
		}
		columns.push(lex.value)
	})

	return columns.filter((c) => !shape.aliases.has(c) && !shape.cteNames.has(c))
}

// ============================================================================
// Validator
// ============================================================================

function issue(rule: GuardrailRule, message: string, suggestion?: string): GuardrailIssue {
	return suggestion === undefined ? { rule, severity: "error", message } : { rule, severity: "error", message, suggestion }
}

function warning(rule: GuardrailRule, message: string, suggestion?: string): GuardrailIssue {
	return { ...issue(rule, message, suggestion), severity: "warning" }
}

export class GuardrailValidator {
	constructor(
		private readonly catalog: Catalog,
		private readonly options: GuardrailOptions,
	) {}

	/**
	 * Validate SQL for a category, or for a full decision (which also enables
	 * the SOURCE_MISMATCH check).
	 */
	validate(sql: string, target: IntentCategory | RoutingDecision): ValidationVerdict {
		const category = typeof target === "string" ? target : target.category
		const decision = typeof target === "string" ? null : target

		const lexemes = lexSQL(sql)
		const shape = analyzeQuery(lexemes)
		const issues: GuardrailIssue[] = []

		this.checkReadOnly(shape, issues)
		this.checkJoins(shape, issues)
		const read = this.checkAllowLists(shape, issues)
		this.checkCategory(shape, category, decision, read, issues)
		this.checkLimit(shape, issues)

		const firstError = issues.find((i) => i.severity === "error")
		const warnings = issues.filter((i) => i.severity === "warning").map((i) => i.message)
		return Object.freeze({
			ok: firstError === undefined,
			violatedRule: firstError ? firstError.rule : null,
			warning: warnings.length > 0 ? warnings.join("; ") : null,
			issues: Object.freeze(issues),
		})
	}

	// ── Rule 1: single read-only statement ──

	private checkReadOnly(shape: QueryShape, issues: GuardrailIssue[]): void {
		const { lexemes, parens } = shape
		const first = lexemes[0]

		if (!first) {
			issues.push(issue("NOT_SELECT_ONLY", "Empty statement", "Write one SELECT statement"))
			return
		}
		if (!isWord(first, "select", "with")) {
			issues.push(
				issue("NOT_SELECT_ONLY", `Statement must start with SELECT or WITH, found "${first.value}"`, "Write one SELECT statement"),
			)
		} else if (isWord(first, "with")) {
			const main = lexemes.findIndex(
				(lex, i) =>
					parens.depth[i] === 0 &&
					isWord(lex, "select", "insert", "update", "delete", "merge", "values", "table"),
			)
			if (main === -1 || !isWord(lexemes[main], "select")) {
				issues.push(
					issue("NOT_SELECT_ONLY", "WITH chain must end in a SELECT", "Make the main statement after the CTEs a SELECT"),
				)
			}
		}

		const semicolons = lexemes.map((lex, i) => (isSymbol(lex, ";") ? i : -1)).filter((i) => i !== -1)
		if (semicolons.length > 1 || (semicolons.length === 1 && semicolons[0] !== lexemes.length - 1)) {
			issues.push(
				issue("NOT_SELECT_ONLY", "Multiple statements detected (separated by semicolons)", "Submit only one SELECT statement"),
			)
		}

		if (!parens.balanced) {
			issues.push(issue("NOT_SELECT_ONLY", "Unbalanced parentheses", "Close every parenthesis"))
		}

		const keywords = [
			...new Set(
				lexemes
					.filter((lex) => lex.kind === "word" && DANGEROUS_KEYWORDS.has(lex.value.toUpperCase()))
					.map((lex) => lex.value.toUpperCase()),
			),
		]
		if (keywords.length > 0) {
			issues.push(
				issue("NOT_SELECT_ONLY", `Dangerous keywords detected: ${keywords.join(", ")}`, "Only SELECT queries are allowed"),
			)
		}

		const functions = [
			...new Set(
				lexemes
					.filter((lex, i) => isFunctionCall(shape, i) && !ALLOWED_FUNCTIONS.has(lex.value))
					.map((lex) => lex.value),
			),
		]
		if (functions.length > 0) {
			issues.push(
				issue(
					"DANGEROUS_FUNCTION",
					`Dangerous functions detected: ${functions.join(", ")}`,
					"Use only aggregate, window and plain scalar functions",
				),
			)
		}
	}

	// ── Rule 2: no joins ──

	private checkJoins(shape: QueryShape, issues: GuardrailIssue[]): void {
		if (shape.joinWords > 0) {
			issues.push(issue("JOIN_FORBIDDEN", "JOIN is not allowed", "Answer from the single routed relation"))
		}
		if (shape.commaJoin) {
			issues.push(
				issue("JOIN_FORBIDDEN", "Implicit join: FROM lists more than one relation", "Answer from the single routed relation"),
			)
		}
	}

	// ── Rule 3: allow-lists ──

	private checkAllowLists(shape: QueryShape, issues: GuardrailIssue[]): RelationRef[] {
		const read: RelationRef[] = []
		const unknown: string[] = []

		for (const ref of shape.relations) {
			if (ref.schema === null && !ref.isFunction && shape.cteNames.has(ref.name)) continue
			const rel = ref.isFunction ? undefined : findRelation(this.catalog, ref.name)
			if (!rel || (ref.schema !== null && ref.schema !== rel.schema)) {
				unknown.push(ref.schema ? `${ref.schema}.${ref.name}` : ref.name)
				continue
			}
			if (!read.includes(rel)) read.push(rel)
		}

		if (unknown.length > 0) {
			issues.push(
				issue(
					"RELATION_NOT_ALLOWED",
					`Relations outside the catalog: ${[...new Set(unknown)].join(", ")}`,
					`Use only these relations: ${this.catalog.relations.map((r) => r.name).join(", ")}`,
				),
			)
		} else {
			const allowed = new Set(read.flatMap((r) => r.allowedColumns))
			const columns = [...new Set(columnReferences(shape).filter((c) => !allowed.has(c)))]
			if (columns.length > 0) {
				issues.push(
					issue(
						"UNKNOWN_COLUMN",
						`Unknown columns: ${columns.join(", ")}`,
						read.length > 0
							? `Allowed columns: ${[...allowed].join(", ")}`
							: "Select columns from a catalog relation",
					),
				)
			}
		}

		for (const rel of read) {
			if (rel.preferredView !== null) {
				issues.push(
					warning(
						"VIEW_PREFERENCE_VIOLATED",
						`Base table ${rel.name} read where view ${rel.preferredView} exists`,
						`Read from ${rel.preferredView} instead`,
					),
				)
			}
		}

		return read
	}

	// ── Rule 4: category guardrails ──

	private checkCategory(
		shape: QueryShape,
		category: IntentCategory,
		decision: RoutingDecision | null,
		read: readonly RelationRef[],
		issues: GuardrailIssue[],
	): void {
		if (CLUB_METRIC_CATEGORIES.includes(category)) {
			const players = read.filter((r) => r.subject === "player")
			if (players.length > 0) {
				issues.push(
					issue(
						"PLAYER_VIEW_MISUSE",
						`Club metric answered from player relation ${players.map((r) => r.name).join(", ")}`,
						"Read club totals from the team-season summary view",
					),
				)
			}
		}

		if (category === "CLUB_TITLES") {
			const seasonTable = read.some((r) => r.role === "season_table")
			if (!seasonTable || !hasRankOneFilter(shape.lexemes)) {
				issues.push(
					issue(
						"TITLE_RANK_FILTER_MISSING",
						"Title counts must read the season table filtered on rank = 1",
						"Count rows of the season table WHERE rank = 1",
					),
				)
			}
		}

		if (category === "MATCH_CONDITIONAL_CLUB_METRIC") {
			const raw = read.filter((r) => r.role === "match_rows")
			if (raw.length > 0) {
				issues.push(
					issue(
						"RAW_TABLE_FOR_STREAK",
						`Streak computed from match rows (${raw.map((r) => r.name).join(", ")})`,
						"Read the precomputed streak view",
					),
				)
			}
			if (!read.some((r) => r.role === "streak")) {
				issues.push(issue("STREAK_VIEW_REQUIRED", "Streak questions must read a streak view", "Read the precomputed streak view"))
			}
		}

		if (decision !== null && !read.some((r) => r.name === decision.source.name)) {
			issues.push(
				warning(
					"SOURCE_MISMATCH",
					`Routed source ${decision.source.name} is not read`,
					`Read from ${decision.source.schema}.${decision.source.name}`,
				),
			)
		}
	}

	// ── Rule 5: row limit ──

	private checkLimit(shape: QueryShape, issues: GuardrailIssue[]): void {
		const { lexemes, parens } = shape
		let limit: number | null = null
		let found = false

		for (let i = 0; i < lexemes.length; i++) {
			if (parens.depth[i] !== 0) continue
			if (isWord(lexemes[i], "limit")) {
				found = true
				limit = positiveInteger(lexemes[i + 1])
			} else if (isWord(lexemes[i], "fetch") && isWord(lexemes[i + 1], "first", "next")) {
				found = true
				const count = lexemes[i + 2]
				if (isWord(count, "row", "rows")) {
					limit = 1
				} else if (isWord(lexemes[i + 3], "row", "rows")) {
					limit = positiveInteger(count)
				}
			}
		}

		if (limit === null) {
			issues.push(
				issue(
					"LIMIT_MISSING",
					found ? "LIMIT must be a positive integer literal" : "Query has no LIMIT clause",
					`Add LIMIT n (n <= ${this.options.maxLimit})`,
				),
			)
		} else if (limit > this.options.maxLimit) {
			issues.push(
				issue("LIMIT_EXCEEDED", `LIMIT ${limit} exceeds maximum of ${this.options.maxLimit}`, `Use LIMIT ${this.options.maxLimit} or less`),
			)
		}
	}
}

function positiveInteger(lex: Lexeme | undefined): number | null {
	if (!lex || lex.kind !== "number" || !/^\d+$/.test(lex.value)) return null
	const n = parseInt(lex.value, 10)
	return n > 0 ? n : null
}

/**
 * `rank = 1` or `1 = rank`, optionally qualified (`t.rank = 1`)
 */
function hasRankOneFilter(lexemes: readonly Lexeme[]): boolean {
	return lexemes.some((lex, i) => {
		if (!isWord(lex, "rank") || isSymbol(lexemes[i + 1], "(")) return false
		const forward = isSymbol(lexemes[i + 1], "=") && lexemes[i + 2]?.kind === "number" && lexemes[i + 2].value === "1"
		const backward =
			isSymbol(lexemes[i - 1], "=") &&
			lexemes[i - 2]?.kind === "number" &&
			lexemes[i - 2].value === "1" &&
			!isSymbol(lexemes[i - 3], ".")
		return forward || backward
	})
}

// ============================================================================
// Repair instructions
// ============================================================================

/**
 * Compress guardrail issues into short instructions for the next proposal
 */
export function compressIssuesForRepair(issues: readonly GuardrailIssue[]): string[] {
	const instructions: string[] = []
	const seen = new Set<string>()

	for (const i of issues) {
		let instruction: string
		switch (i.rule) {
			case "NOT_SELECT_ONLY":
				instruction = "Output one read-only SELECT statement only"
				break
			case "DANGEROUS_FUNCTION":
				instruction = "Call only aggregate, window and plain scalar functions (no query_to_xml, nextval, pg_sleep)"
				break
			case "JOIN_FORBIDDEN":
				instruction = "Do not join: read only the routed relation"
				break
			case "LIMIT_MISSING":
				instruction = "Add a LIMIT clause with a positive integer"
				break
			case "UNKNOWN_COLUMN":
				instruction = i.message
				break
			default:
				instruction = i.suggestion ?? i.message
		}

		if (!seen.has(instruction)) {
			seen.add(instruction)
			instructions.push(instruction)
		}
	}

	return instructions
}

export function formatIssuesForLog(issues: readonly GuardrailIssue[]): string {
	return issues.map((i) => `[${i.severity.toUpperCase()}] ${i.rule}: ${i.message}`).join("\n")
}

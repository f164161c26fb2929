/**
 * Catalog and Routing Types
 *
 * Defines types for:
 * - Intent categories and metric lexicons
 * - RelationRef (allow-listed views/tables)
 * - RoutingDecision (router output, assembler input)
 * - ValidationVerdict (guardrail output)
 * - RetryToken (terminal artifact for unanswerable questions)
 *
 * Everything produced from the catalog is deep-frozen; components share it
 * by reference.
 */

// ============================================================================
// Intent
// ============================================================================

export const INTENT_CATEGORIES = [
	"CLUB_TITLES",
	"MATCH_CONDITIONAL_CLUB_METRIC",
	"PLAYER_FOR_CLUB",
	"CLUB_METRIC_SEASON",
	"CLUB_METRIC_ALL_TIME",
	"AMBIGUOUS",
] as const

export type IntentCategory = (typeof INTENT_CATEGORIES)[number]

/** Categories a keyword rule may select (AMBIGUOUS is never a rule target) */
export type RoutableCategory = Exclude<IntentCategory, "AMBIGUOUS">

export type SortDirection = "ASC" | "DESC"

export type QuestionScope = "season" | "all_time"

// ============================================================================
// Metric Lexicon
// ============================================================================

export const METRIC_SCOPES = ["club", "player", "titles", "streak"] as const

export type MetricScope = (typeof METRIC_SCOPES)[number]

export interface MetricSpec {
	readonly phrase: string
	readonly column: string
	readonly direction: SortDirection
}

// ============================================================================
// Relations
// ============================================================================

export type RelationKind = "table" | "view"

export type RelationSubject = "team" | "player" | "match"

export type RelationRole =
	| "season_table"
	| "team_season_summary"
	| "player_club_totals"
	| "player_season"
	| "player_career"
	| "match_rows"
	| "streak"

export const STREAK_FAMILIES = ["clean_sheet", "unbeaten", "scoring", "win"] as const

export type StreakFamily = (typeof STREAK_FAMILIES)[number]

export interface StreakInfo {
	readonly family: StreakFamily
	readonly scope: QuestionScope
}

export interface RelationRef {
	readonly schema: string
	readonly name: string
	readonly kind: RelationKind
	readonly subject: RelationSubject
	readonly role: RelationRole
	/** Columns that uniquely identify one row, in order */
	readonly grain: readonly string[]
	readonly allowedColumns: readonly string[]
	/** View that should be read instead of this base table, if any */
	readonly preferredView: string | null
	readonly metricScope: MetricScope | null
	readonly streak: StreakInfo | null
}

// ============================================================================
// Routing
// ============================================================================

export type StructuralConstraint =
	| { readonly kind: "where"; readonly column: string; readonly value: string | number }
	| { readonly kind: "group_by"; readonly columns: readonly string[] }

export interface AggregateSpec {
	readonly fn: "COUNT" | "SUM"
	/** Column name, or "*" for COUNT(*) */
	readonly argument: string
	readonly alias: string
}

export interface RoutingDecision {
	readonly category: RoutableCategory
	readonly source: RelationRef
	readonly constraints: readonly StructuralConstraint[]
	readonly metric: MetricSpec
	readonly aggregate: AggregateSpec | null
	/** Non-metric columns projected before the metric */
	readonly projection: readonly string[]
	/** Canonical team name used as a filter, if the question names one */
	readonly team: string | null
	readonly limit: number
	/** Every relation the router considered; surfaced on retry */
	readonly candidates: readonly RelationRef[]
	readonly matchedKeywords: readonly string[]
}

// ============================================================================
// Guardrails
// ============================================================================

export type GuardrailRule =
	| "NOT_SELECT_ONLY"
	| "DANGEROUS_FUNCTION"
	| "JOIN_FORBIDDEN"
	| "RELATION_NOT_ALLOWED"
	| "UNKNOWN_COLUMN"
	| "VIEW_PREFERENCE_VIOLATED"
	| "PLAYER_VIEW_MISUSE"
	| "TITLE_RANK_FILTER_MISSING"
	| "RAW_TABLE_FOR_STREAK"
	| "STREAK_VIEW_REQUIRED"
	| "SOURCE_MISMATCH"
	| "LIMIT_MISSING"
	| "LIMIT_EXCEEDED"

export interface GuardrailIssue {
	rule: GuardrailRule
	severity: "error" | "warning"
	message: string
	suggestion?: string
}

export interface ValidationVerdict {
	readonly ok: boolean
	/** First error-level rule in check order */
	readonly violatedRule: GuardrailRule | null
	/** All warning messages joined, or null */
	readonly warning: string | null
	readonly issues: readonly GuardrailIssue[]
}

// ============================================================================
// Retry
// ============================================================================

export type RetryKind =
	| "ClassificationAmbiguous"
	| "RoutingUnresolved"
	| "GuardrailViolation"
	| "LimitExceeded"

export interface RetryToken {
	readonly kind: RetryKind
	readonly reason: string
	readonly rule: GuardrailRule | null
	readonly category: IntentCategory
	readonly candidateSources: readonly RelationRef[]
	readonly originalQuestion: string
}

export type RouteOutcome =
	| { readonly ok: true; readonly decision: RoutingDecision }
	| { readonly ok: false; readonly token: RetryToken }

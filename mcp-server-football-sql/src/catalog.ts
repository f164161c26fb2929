/**
 * Static Catalog Loader
 *
 * Loads the allow-listed relations, metric lexicons, keyword rules and team
 * names from config/catalog/*.json once at startup. Every file is validated
 * and cross-checked; any failure throws a non-recoverable catalog error so the
 * server never serves requests against a partial catalog.
 *
 * Phrases are normalized with the same function as questions, and the
 * resulting catalog is deep-frozen.
 */

import * as fs from "fs"
import * as path from "path"
import { z } from "zod"
import {
	INTENT_CATEGORIES,
	METRIC_SCOPES,
	STREAK_FAMILIES,
	type MetricScope,
	type MetricSpec,
	type QuestionScope,
	type RelationRef,
	type RelationRole,
	type RoutableCategory,
	type StreakFamily,
} from "./catalog_types.js"
import { FootballSQLError } from "./config.js"
import { normalizeQuestion } from "./text_normalize.js"

// ============================================================================
// Types
// ============================================================================

export interface KeywordRule {
	readonly category: RoutableCategory
	readonly keywords: readonly string[]
}

export interface TeamEntry {
	readonly name: string
	readonly aliases: readonly string[]
}

export interface DirectionModifiers {
	readonly DESC: readonly string[]
	readonly ASC: readonly string[]
}

export interface Catalog {
	readonly relations: readonly RelationRef[]
	readonly ambiguousCandidates: readonly RelationRef[]
	readonly lexicons: Readonly<Record<MetricScope, readonly MetricSpec[]>>
	readonly modifiers: DirectionModifiers
	/** In priority order: titles, match-conditional, player-for-club, season, all-time */
	readonly rules: readonly KeywordRule[]
	readonly streakFamilies: Readonly<Record<StreakFamily, readonly string[]>>
	readonly teams: readonly TeamEntry[]
}

/**
 * Fixed precedence of keyword rules. The catalog may not reorder it.
 */
export const RULE_PRIORITY: readonly RoutableCategory[] = [
	"CLUB_TITLES",
	"MATCH_CONDITIONAL_CLUB_METRIC",
	"PLAYER_FOR_CLUB",
	"CLUB_METRIC_SEASON",
	"CLUB_METRIC_ALL_TIME",
]

const SINGLE_ROLES: readonly RelationRole[] = ["season_table", "team_season_summary", "player_club_totals"]

// ============================================================================
// File Schemas
// ============================================================================

const identifier = z.string().regex(/^[a-z_][a-z0-9_]*$/, "must be a lower-case SQL identifier")

const relationSchema = z.object({
	schema: identifier,
	name: identifier,
	kind: z.enum(["table", "view"]),
	subject: z.enum(["team", "player", "match"]),
	role: z.enum([
		"season_table",
		"team_season_summary",
		"player_club_totals",
		"player_season",
		"player_career",
		"match_rows",
		"streak",
	]),
	grain: z.array(identifier).min(1),
	columns: z.array(identifier).min(1),
	preferred_view: identifier.optional(),
	metric_scope: z.enum(METRIC_SCOPES).optional(),
	streak: z
		.object({
			family: z.enum(STREAK_FAMILIES),
			scope: z.enum(["season", "all_time"]),
		})
		.optional(),
})

const relationsFileSchema = z.object({
	relations: z.array(relationSchema).min(1),
	ambiguous_candidates: z.array(identifier).min(1),
})

const metricEntrySchema = z.object({
	phrase: z.string().min(1),
	column: identifier,
	direction: z.enum(["ASC", "DESC"]),
})

const lexiconFileSchema = z.object({
	modifiers: z.object({
		DESC: z.array(z.string().min(1)).min(1),
		ASC: z.array(z.string().min(1)).min(1),
	}),
	scopes: z.object({
		club: z.array(metricEntrySchema).min(1),
		player: z.array(metricEntrySchema).min(1),
		titles: z.array(metricEntrySchema).min(1),
		streak: z.array(metricEntrySchema).min(1),
	}),
})

const routableCategory = z.enum(INTENT_CATEGORIES).refine(
	(c): c is RoutableCategory => c !== "AMBIGUOUS",
	"AMBIGUOUS cannot be a rule target",
)

const keywordsFileSchema = z.object({
	rules: z.array(
		z.object({
			category: routableCategory,
			keywords: z.array(z.string().min(1)).min(1),
		}),
	),
	streak_families: z.object({
		clean_sheet: z.array(z.string().min(1)).min(1),
		unbeaten: z.array(z.string().min(1)).min(1),
		scoring: z.array(z.string().min(1)).min(1),
		win: z.array(z.string().min(1)).min(1),
	}),
})

const teamsFileSchema = z.object({
	teams: z
		.array(
			z.object({
				name: z.string().min(1),
				aliases: z.array(z.string().min(1)),
			}),
		)
		.min(1),
})

export interface RawCatalogFiles {
	relations: unknown
	lexicon: unknown
	keywords: unknown
	teams: unknown
}

export const CATALOG_FILES: Record<keyof RawCatalogFiles, string> = {
	relations: "relations.json",
	lexicon: "lexicon.json",
	keywords: "keywords.json",
	teams: "teams.json",
}

// ============================================================================
// Loading
// ============================================================================

function catalogError(message: string, context?: Record<string, unknown>): FootballSQLError {
	return new FootballSQLError("catalog", message, false, context)
}

function readJsonFile(filePath: string): unknown {
	if (!fs.existsSync(filePath)) {
		throw catalogError(`Catalog file not found: ${filePath}`, { path: filePath })
	}
	const raw = fs.readFileSync(filePath, "utf-8")
	try {
		return JSON.parse(raw)
	} catch (err) {
		throw catalogError(`Catalog file is not valid JSON: ${filePath}`, {
			path: filePath,
			error: String(err),
		})
	}
}

function parseFile<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, file: string): T {
	const result = schema.safeParse(data)
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
			.join("; ")
		throw catalogError(`Catalog file ${file} is invalid: ${details}`, { file })
	}
	return result.data
}

function normalizePhrase(phrase: string, file: string): string {
	const normalized = normalizeQuestion(phrase)
	if (normalized.length === 0) {
		throw catalogError(`Catalog file ${file} has a phrase that normalizes to nothing: "${phrase}"`)
	}
	return normalized
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value)
		for (const child of Object.values(value)) {
			deepFreeze(child)
		}
	}
	return value
}

/**
 * Read all catalog files from a directory
 */
export function loadCatalog(dir: string): Catalog {
	const raw: RawCatalogFiles = {
		relations: readJsonFile(path.join(dir, CATALOG_FILES.relations)),
		lexicon: readJsonFile(path.join(dir, CATALOG_FILES.lexicon)),
		keywords: readJsonFile(path.join(dir, CATALOG_FILES.keywords)),
		teams: readJsonFile(path.join(dir, CATALOG_FILES.teams)),
	}
	return buildCatalog(raw)
}

/**
 * Validate, normalize, cross-check and freeze already-parsed catalog data
 */
export function buildCatalog(raw: RawCatalogFiles): Catalog {
	const relationsFile = parseFile(relationsFileSchema, raw.relations, CATALOG_FILES.relations)
	const lexiconFile = parseFile(lexiconFileSchema, raw.lexicon, CATALOG_FILES.lexicon)
	const keywordsFile = parseFile(keywordsFileSchema, raw.keywords, CATALOG_FILES.keywords)
	const teamsFile = parseFile(teamsFileSchema, raw.teams, CATALOG_FILES.teams)

	// Relations
	const relations: RelationRef[] = relationsFile.relations.map((r) => ({
		schema: r.schema,
		name: r.name,
		kind: r.kind,
		subject: r.subject,
		role: r.role,
		grain: r.grain,
		allowedColumns: r.columns,
		preferredView: r.preferred_view ?? null,
		metricScope: r.metric_scope ?? null,
		streak: r.streak ?? null,
	}))
	const byName = new Map<string, RelationRef>()
	for (const rel of relations) {
		if (byName.has(rel.name)) {
			throw catalogError(`Duplicate relation in catalog: ${rel.name}`)
		}
		byName.set(rel.name, rel)
		const missingGrain = rel.grain.filter((g) => !rel.allowedColumns.includes(g))
		if (missingGrain.length > 0) {
			throw catalogError(`Relation ${rel.name} has grain columns outside its allow-list: ${missingGrain.join(", ")}`)
		}
		if ((rel.role === "streak") !== (rel.streak !== null)) {
			throw catalogError(`Relation ${rel.name} must declare streak info exactly when its role is streak`)
		}
	}
	for (const rel of relations) {
		if (rel.preferredView === null) continue
		const view = byName.get(rel.preferredView)
		if (!view || view.kind !== "view") {
			throw catalogError(`Relation ${rel.name} prefers unknown view ${rel.preferredView}`)
		}
	}
	for (const role of SINGLE_ROLES) {
		const count = relations.filter((r) => r.role === role).length
		if (count !== 1) {
			throw catalogError(`Catalog must contain exactly one ${role} relation, found ${count}`)
		}
	}
	const scopes: QuestionScope[] = ["all_time", "season"]
	for (const family of STREAK_FAMILIES) {
		for (const scope of scopes) {
			const count = relations.filter((r) => r.streak?.family === family && r.streak.scope === scope).length
			if (count !== 1) {
				throw catalogError(`Catalog must contain exactly one ${family}/${scope} streak view, found ${count}`)
			}
		}
	}
	const ambiguousCandidates = relationsFile.ambiguous_candidates.map((name) => {
		const rel = byName.get(name)
		if (!rel) throw catalogError(`Unknown ambiguous candidate relation: ${name}`)
		return rel
	})

	// Lexicons
	const lexicons: Record<MetricScope, MetricSpec[]> = {
		club: [],
		player: [],
		titles: [],
		streak: [],
	}
	for (const scope of METRIC_SCOPES) {
		lexicons[scope] = lexiconFile.scopes[scope].map((entry) => ({
			phrase: normalizePhrase(entry.phrase, CATALOG_FILES.lexicon),
			column: entry.column,
			direction: entry.direction,
		}))
	}
	for (const rel of relations) {
		if (rel.metricScope === null || rel.metricScope === "titles") continue
		const unknown = lexicons[rel.metricScope].filter((m) => !rel.allowedColumns.includes(m.column))
		if (unknown.length > 0) {
			throw catalogError(
				`Lexicon ${rel.metricScope} maps to columns missing from ${rel.name}: ${unknown.map((m) => m.column).join(", ")}`,
			)
		}
	}
	const modifiers: DirectionModifiers = {
		DESC: lexiconFile.modifiers.DESC.map((m) => normalizePhrase(m, CATALOG_FILES.lexicon)),
		ASC: lexiconFile.modifiers.ASC.map((m) => normalizePhrase(m, CATALOG_FILES.lexicon)),
	}
	const overlap = modifiers.DESC.filter((m) => modifiers.ASC.includes(m))
	if (overlap.length > 0) {
		throw catalogError(`Direction modifiers listed as both ASC and DESC: ${overlap.join(", ")}`)
	}

	// Keyword rules
	const ruleOrder = keywordsFile.rules.map((r) => r.category)
	if (ruleOrder.length !== RULE_PRIORITY.length || ruleOrder.some((c, i) => c !== RULE_PRIORITY[i])) {
		throw catalogError(`Keyword rules must be declared in priority order: ${RULE_PRIORITY.join(" > ")}`, {
			found: ruleOrder,
		})
	}
	const rules: KeywordRule[] = keywordsFile.rules.map((r) => ({
		category: r.category,
		keywords: r.keywords.map((k) => normalizePhrase(k, CATALOG_FILES.keywords)),
	}))
	const streakFamilies: Record<StreakFamily, string[]> = {
		clean_sheet: [],
		unbeaten: [],
		scoring: [],
		win: [],
	}
	for (const family of STREAK_FAMILIES) {
		streakFamilies[family] = keywordsFile.streak_families[family].map((k) =>
			normalizePhrase(k, CATALOG_FILES.keywords),
		)
	}

	// Teams
	const teams: TeamEntry[] = teamsFile.teams.map((t) => ({
		name: t.name,
		aliases: t.aliases.map((a) => normalizePhrase(a, CATALOG_FILES.teams)),
	}))

	return deepFreeze({
		relations,
		ambiguousCandidates,
		lexicons,
		modifiers,
		rules,
		streakFamilies,
		teams,
	})
}

// ============================================================================
// Lookups
// ============================================================================

export function findRelation(catalog: Catalog, name: string): RelationRef | undefined {
	const lower = name.toLowerCase()
	return catalog.relations.find((r) => r.name === lower)
}

export function relationByRole(catalog: Catalog, role: RelationRole): RelationRef {
	const rel = catalog.relations.find((r) => r.role === role)
	if (!rel) {
		throw catalogError(`Catalog has no ${role} relation`)
	}
	return rel
}

export function streakViews(catalog: Catalog): RelationRef[] {
	return catalog.relations.filter((r) => r.streak !== null)
}

export function streakView(catalog: Catalog, family: StreakFamily, scope: QuestionScope): RelationRef {
	const rel = catalog.relations.find((r) => r.streak?.family === family && r.streak.scope === scope)
	if (!rel) {
		throw catalogError(`Catalog has no ${family}/${scope} streak view`)
	}
	return rel
}

export function qualifiedName(rel: RelationRef): string {
	return `${rel.schema}.${rel.name}`
}

/**
 * Source Router
 *
 * Maps a classified question to the one relation it must be answered from,
 * plus fixed structural constraints, the resolved metric and the row count.
 *
 * Category table:
 * - CLUB_TITLES                    season table, rank = 1, COUNT(*) per team
 * - MATCH_CONDITIONAL_CLUB_METRIC  streak view chosen by family and scope
 * - PLAYER_FOR_CLUB                player-by-squad view, club filter required
 * - CLUB_METRIC_SEASON             team-season summary, one row per team-season
 * - CLUB_METRIC_ALL_TIME           team-season summary, SUM(metric) per team
 * - AMBIGUOUS                      retry token, no relation
 *
 * The router never guesses: anything it cannot pin down becomes a retry token
 * listing the relations it considered.
 */

import type {
	AggregateSpec,
	IntentCategory,
	MetricScope,
	MetricSpec,
	RelationRef,
	RoutableCategory,
	RouteOutcome,
	RoutingDecision,
	StreakFamily,
	StructuralConstraint,
} from "./catalog_types.js"
import { STREAK_FAMILIES } from "./catalog_types.js"
import { relationByRole, streakView, streakViews, type Catalog } from "./catalog.js"
import { extractTeam, extractTopN } from "./entity_extractor.js"
import type { Classification } from "./intent_classifier.js"
import type { MetricLexicon } from "./metric_lexicon.js"
import { createRetryToken } from "./retry_controller.js"
import { containsPhrase, normalizeQuestion } from "./text_normalize.js"

export interface RouterOptions {
	/** Row count when the question does not ask for "top N" */
	defaultLimit: number
}

type MetricOutcome = { ok: true; metric: MetricSpec } | { ok: false; outcome: RouteOutcome }

export class SourceRouter {
	constructor(
		private readonly catalog: Catalog,
		private readonly lexicon: MetricLexicon,
		private readonly options: RouterOptions,
	) {}

	/**
	 * Route a classified question. `question` is the original text, carried
	 * verbatim into any retry token.
	 */
	route(classification: Classification, question: string): RouteOutcome {
		const text = normalizeQuestion(question)

		if (classification.category === "AMBIGUOUS") {
			return this.retry(question, "AMBIGUOUS", {
				kind: "ClassificationAmbiguous",
				reason: `ambiguous routing: ${classification.reason}`,
				candidates: this.catalog.ambiguousCandidates,
			})
		}
		const category = classification.category
		const matchedKeywords = classification.matchedKeywords

		const team = extractTeam(text, this.catalog.teams)
		const limit = extractTopN(text) ?? this.options.defaultLimit
		const teamFilter: StructuralConstraint[] = team ? [{ kind: "where", column: "team", value: team }] : []

		switch (category) {
			case "CLUB_TITLES": {
				const source = relationByRole(this.catalog, "season_table")
				const resolved = this.resolveMetric(category, "titles", text, matchedKeywords, source, question)
				if (!resolved.ok) return resolved.outcome
				return this.decide(category, matchedKeywords, {
					source,
					metric: resolved.metric,
					constraints: [
						{ kind: "where", column: "rank", value: 1 },
						...teamFilter,
						{ kind: "group_by", columns: ["team"] },
					],
					aggregate: { fn: "COUNT", argument: "*", alias: resolved.metric.column },
					projection: ["team"],
					team,
					limit,
				})
			}

			case "MATCH_CONDITIONAL_CLUB_METRIC": {
				const family = this.streakFamily(text)
				if (family === null) {
					return this.retry(question, category, {
						kind: "RoutingUnresolved",
						reason: "routing unresolved: streak question does not say which kind of streak (win, unbeaten, clean sheet, scoring)",
						candidates: streakViews(this.catalog),
					})
				}
				const source = streakView(this.catalog, family, classification.scope ?? "all_time")
				const resolved = this.resolveMetric(category, "streak", text, matchedKeywords, source, question)
				if (!resolved.ok) return resolved.outcome
				return this.decide(category, matchedKeywords, {
					source,
					metric: resolved.metric,
					constraints: teamFilter,
					aggregate: null,
					projection: source.grain,
					team,
					limit,
				})
			}

			case "PLAYER_FOR_CLUB": {
				const source = relationByRole(this.catalog, "player_club_totals")
				if (!team) {
					return this.retry(question, category, {
						kind: "RoutingUnresolved",
						reason: "routing unresolved: player-for-club question does not name a club",
						candidates: [source],
					})
				}
				const resolved = this.resolveMetric(category, "player", text, matchedKeywords, source, question)
				if (!resolved.ok) return resolved.outcome
				return this.decide(category, matchedKeywords, {
					source,
					metric: resolved.metric,
					constraints: [...teamFilter, { kind: "group_by", columns: ["player"] }],
					aggregate: sumOf(resolved.metric),
					projection: ["player"],
					team,
					limit,
				})
			}

			case "CLUB_METRIC_SEASON": {
				const source = relationByRole(this.catalog, "team_season_summary")
				const resolved = this.resolveMetric(category, "club", text, matchedKeywords, source, question)
				if (!resolved.ok) return resolved.outcome
				return this.decide(category, matchedKeywords, {
					source,
					metric: resolved.metric,
					constraints: teamFilter,
					aggregate: null,
					projection: source.grain,
					team,
					limit,
				})
			}

			case "CLUB_METRIC_ALL_TIME": {
				const source = relationByRole(this.catalog, "team_season_summary")
				const resolved = this.resolveMetric(category, "club", text, matchedKeywords, source, question)
				if (!resolved.ok) return resolved.outcome
				return this.decide(category, matchedKeywords, {
					source,
					metric: resolved.metric,
					constraints: [...teamFilter, { kind: "group_by", columns: ["team"] }],
					aggregate: sumOf(resolved.metric),
					projection: ["team"],
					team,
					limit,
				})
			}
		}
	}

	/**
	 * First streak family (clean sheet, unbeaten, scoring, win) with a hit
	 */
	private streakFamily(text: string): StreakFamily | null {
		for (const family of STREAK_FAMILIES) {
			if (this.catalog.streakFamilies[family].some((kw) => containsPhrase(text, kw))) {
				return family
			}
		}
		return null
	}

	private resolveMetric(
		category: RoutableCategory,
		scope: MetricScope,
		text: string,
		matchedKeywords: readonly string[],
		source: RelationRef,
		question: string,
	): MetricOutcome {
		const resolution = this.lexicon.resolve(scope, text, matchedKeywords)
		switch (resolution.status) {
			case "resolved":
				return { ok: true, metric: resolution.metric }
			case "conflict":
				return {
					ok: false,
					outcome: this.retry(question, "AMBIGUOUS", {
						kind: "ClassificationAmbiguous",
						reason: `ambiguous routing: conflicting direction modifiers (${resolution.modifiers.join(", ")})`,
						candidates: [source],
					}),
				}
			case "none":
				return {
					ok: false,
					outcome: this.retry(question, category, {
						kind: "RoutingUnresolved",
						reason: `routing unresolved: no ${scope} metric phrase found in question`,
						candidates: [source],
					}),
				}
		}
	}

	private decide(
		category: RoutableCategory,
		matchedKeywords: readonly string[],
		parts: Omit<RoutingDecision, "category" | "candidates" | "matchedKeywords">,
	): RouteOutcome {
		const decision: RoutingDecision = Object.freeze({
			category,
			source: parts.source,
			constraints: Object.freeze([...parts.constraints]),
			metric: parts.metric,
			aggregate: parts.aggregate ? Object.freeze({ ...parts.aggregate }) : null,
			projection: Object.freeze([...parts.projection]),
			team: parts.team,
			limit: parts.limit,
			candidates: Object.freeze([parts.source]),
			matchedKeywords: Object.freeze([...matchedKeywords]),
		})
		return { ok: true, decision }
	}

	private retry(
		question: string,
		category: IntentCategory,
		args: {
			kind: "ClassificationAmbiguous" | "RoutingUnresolved"
			reason: string
			candidates: readonly RelationRef[]
		},
	): RouteOutcome {
		return {
			ok: false,
			token: createRetryToken({
				kind: args.kind,
				reason: args.reason,
				category,
				candidateSources: args.candidates,
				originalQuestion: question,
			}),
		}
	}
}

function sumOf(metric: MetricSpec): AggregateSpec {
	return { fn: "SUM", argument: metric.column, alias: `total_${metric.column}` }
}

/**
 * Keyword Classifier
 *
 * Assigns exactly one intent category to a question using the ordered
 * keyword rules from the catalog:
 *
 *   titles > match-conditional (streaks) > player-for-club > season > all-time
 *
 * The first rule with a whole-word hit wins. For categories whose answer
 * depends on time scope (streaks, season and all-time metrics), the season
 * and all-time keyword hits are then compared: a tie with hits on both sides
 * is AMBIGUOUS, otherwise the side with more hits decides the scope.
 *
 * Pure function of the normalized text and the rule table.
 */

import type { IntentCategory, QuestionScope, RoutableCategory } from "./catalog_types.js"
import type { KeywordRule } from "./catalog.js"
import { findPhrase, normalizeQuestion, type PhraseMatch } from "./text_normalize.js"

export interface Classification {
	category: IntentCategory
	/** Keywords of the winning rule, then any scope keywords that decided it */
	matchedKeywords: string[]
	/** Dominant time scope, or null when no scope keyword was present */
	scope: QuestionScope | null
	reason: string
}

const SCOPE_DEPENDENT: readonly RoutableCategory[] = [
	"MATCH_CONDITIONAL_CLUB_METRIC",
	"CLUB_METRIC_SEASON",
	"CLUB_METRIC_ALL_TIME",
]

/**
 * Keywords of a rule that occur in the text, ignoring hits that sit inside a
 * longer hit of the same rule ("all time" inside "of all time" counts once).
 */
export function keywordHits(text: string, keywords: readonly string[]): string[] {
	const matches: PhraseMatch[] = keywords.flatMap((kw) => findPhrase(text, kw))
	const outer = matches.filter(
		(m) =>
			!matches.some(
				(other) => other !== m && other.start <= m.start && other.end >= m.end && other.end - other.start > m.end - m.start,
			),
	)
	const phrases = new Set(outer.map((m) => m.phrase))
	return keywords.filter((kw) => phrases.has(kw))
}

function ruleFor(rules: readonly KeywordRule[], category: RoutableCategory): readonly string[] {
	return rules.find((r) => r.category === category)?.keywords ?? []
}

/**
 * Classify a question. Input is normalized again, which is a no-op for text
 * that is already normalized.
 */
export function classifyQuestion(question: string, rules: readonly KeywordRule[]): Classification {
	const text = normalizeQuestion(question)
	if (text.length === 0) {
		return { category: "AMBIGUOUS", matchedKeywords: [], scope: null, reason: "empty question" }
	}

	let winner: RoutableCategory | null = null
	let winnerHits: string[] = []
	for (const rule of rules) {
		const hits = keywordHits(text, rule.keywords)
		if (hits.length > 0) {
			winner = rule.category
			winnerHits = hits
			break
		}
	}

	if (winner === null) {
		return { category: "AMBIGUOUS", matchedKeywords: [], scope: null, reason: "no keyword rule matched" }
	}

	if (!SCOPE_DEPENDENT.includes(winner)) {
		return {
			category: winner,
			matchedKeywords: winnerHits,
			scope: null,
			reason: `matched ${winner} keywords: ${winnerHits.join(", ")}`,
		}
	}

	const seasonHits = keywordHits(text, ruleFor(rules, "CLUB_METRIC_SEASON"))
	const allTimeHits = keywordHits(text, ruleFor(rules, "CLUB_METRIC_ALL_TIME"))
	const matchedKeywords = [...new Set([...winnerHits, ...seasonHits, ...allTimeHits])]

	if (seasonHits.length > 0 && seasonHits.length === allTimeHits.length) {
		return {
			category: "AMBIGUOUS",
			matchedKeywords,
			scope: null,
			reason: `conflicting scope keywords: season [${seasonHits.join(", ")}] vs all-time [${allTimeHits.join(", ")}]`,
		}
	}

	let scope: QuestionScope | null = null
	if (seasonHits.length > allTimeHits.length) scope = "season"
	else if (allTimeHits.length > seasonHits.length) scope = "all_time"

	let category: RoutableCategory = winner
	if (winner !== "MATCH_CONDITIONAL_CLUB_METRIC") {
		category = scope === "all_time" ? "CLUB_METRIC_ALL_TIME" : "CLUB_METRIC_SEASON"
	}

	return {
		category,
		matchedKeywords,
		scope,
		reason: `matched ${category} keywords: ${matchedKeywords.join(", ")}`,
	}
}

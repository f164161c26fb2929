/**
 * Metric Lexicon
 *
 * Maps metric phrases in a question to a (column, direction) pair.
 *
 * Lookup is longest-match: entries are pre-sorted by phrase length
 * (descending, declaration order on ties), so "goals conceded" is tried
 * before "goals". Direction modifiers ("most", "fewest", ...) found outside
 * the matched phrase and outside the classifier's matched keywords
 * ("best season") override the entry's default direction when they all
 * agree; modifiers pointing both ways are a conflict.
 */

import type { MetricScope, MetricSpec, SortDirection } from "./catalog_types.js"
import type { Catalog, DirectionModifiers } from "./catalog.js"
import { findPhrase, type PhraseMatch } from "./text_normalize.js"

export type MetricResolution =
	| {
			status: "resolved"
			metric: MetricSpec
			/** null when the scope default was used */
			matchedPhrase: string | null
			modifiers: string[]
	  }
	| { status: "none" }
	| { status: "conflict"; modifiers: string[] }

/**
 * Scopes whose questions always mean one column; they fall back to their
 * first entry when no phrase matches.
 */
const DEFAULTING_SCOPES: readonly MetricScope[] = ["titles", "streak"]

interface IndexedEntry {
	spec: MetricSpec
	order: number
}

function sortLongestFirst(entries: readonly MetricSpec[]): MetricSpec[] {
	return entries
		.map((spec, order): IndexedEntry => ({ spec, order }))
		.sort((a, b) => b.spec.phrase.length - a.spec.phrase.length || a.order - b.order)
		.map((e) => e.spec)
}

function overlaps(match: PhraseMatch, span: PhraseMatch): boolean {
	return match.start < span.end && span.start < match.end
}

export class MetricLexicon {
	private readonly sorted: Record<MetricScope, MetricSpec[]>

	constructor(
		private readonly entries: Readonly<Record<MetricScope, readonly MetricSpec[]>>,
		private readonly modifiers: DirectionModifiers,
	) {
		this.sorted = {
			club: sortLongestFirst(entries.club),
			player: sortLongestFirst(entries.player),
			titles: sortLongestFirst(entries.titles),
			streak: sortLongestFirst(entries.streak),
		}
	}

	static fromCatalog(catalog: Catalog): MetricLexicon {
		return new MetricLexicon(catalog.lexicons, catalog.modifiers)
	}

	/**
	 * Resolve the metric for normalized question text within one scope.
	 * Modifier words inside any of `keywords` are not direction modifiers.
	 */
	resolve(scope: MetricScope, text: string, keywords: readonly string[] = []): MetricResolution {
		let spec: MetricSpec | null = null
		let span: PhraseMatch | null = null

		for (const entry of this.sorted[scope]) {
			const matches = findPhrase(text, entry.phrase)
			if (matches.length > 0) {
				spec = entry
				span = matches[0]
				break
			}
		}

		const reserved = keywords.flatMap((kw) => findPhrase(text, kw))
		const found = this.findModifiers(text, span ? [span, ...reserved] : reserved)
		const directions = new Set(found.map((m) => m.direction))
		const modifiers = found.map((m) => m.phrase)
		if (directions.size > 1) {
			return { status: "conflict", modifiers }
		}

		let matchedPhrase: string | null = spec ? spec.phrase : null
		if (!spec) {
			const fallback = this.entries[scope][0]
			if (!DEFAULTING_SCOPES.includes(scope) || !fallback) {
				return { status: "none" }
			}
			spec = fallback
			matchedPhrase = null
		}

		const override = found.length > 0 ? found[0].direction : null
		const metric: MetricSpec =
			override !== null && override !== spec.direction
				? Object.freeze({ phrase: spec.phrase, column: spec.column, direction: override })
				: spec
		return { status: "resolved", metric, matchedPhrase, modifiers }
	}

	private findModifiers(text: string, reserved: readonly PhraseMatch[]): { phrase: string; direction: SortDirection }[] {
		const found: { phrase: string; direction: SortDirection }[] = []
		const directions: SortDirection[] = ["DESC", "ASC"]
		for (const direction of directions) {
			for (const phrase of this.modifiers[direction]) {
				const outside = findPhrase(text, phrase).filter((m) => !reserved.some((r) => overlaps(m, r)))
				if (outside.length > 0) {
					found.push({ phrase, direction })
				}
			}
		}
		return found
	}
}

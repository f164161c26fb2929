/**
 * Question Normalization
 *
 * Questions and catalog phrases pass through the same normalizer so that
 * phrase matching is symmetric: "All-time", "all time" and "ALL TIME!" are
 * the same text after normalization.
 */

/**
 * Lower-case, drop possessive 's, replace every non-alphanumeric run with a
 * single space, trim. Idempotent.
 */
export function normalizeQuestion(text: string): string {
	return text
		.toLowerCase()
		.replace(/[‘’]/g, "'")
		.replace(/'s\b/g, "")
		.replace(/[^a-z0-9]+/g, " ")
		.trim()
}

/**
 * Span of a whole-word phrase match within normalized text
 */
export interface PhraseMatch {
	phrase: string
	start: number
	end: number
}

/**
 * Find every whole-word occurrence of a normalized phrase.
 * Both arguments must already be normalized.
 */
export function findPhrase(text: string, phrase: string): PhraseMatch[] {
	const matches: PhraseMatch[] = []
	if (phrase.length === 0) return matches

	let from = 0
	while (from <= text.length - phrase.length) {
		const idx = text.indexOf(phrase, from)
		if (idx === -1) break
		const end = idx + phrase.length
		const boundaryBefore = idx === 0 || text[idx - 1] === " "
		const boundaryAfter = end === text.length || text[end] === " "
		if (boundaryBefore && boundaryAfter) {
			matches.push({ phrase, start: idx, end })
		}
		from = idx + 1
	}
	return matches
}

export function containsPhrase(text: string, phrase: string): boolean {
	return findPhrase(text, phrase).length > 0
}

/**
 * Phrases (in the order given) that occur in the text
 */
export function matchedPhrases(text: string, phrases: readonly string[]): string[] {
	return phrases.filter((p) => containsPhrase(text, p))
}

/**
 * Entity Extraction
 *
 * Pulls the two entities routing needs out of normalized question text:
 * a canonical team name (from the catalog's name/alias table) and an
 * optional "top N" row count.
 */

import type { TeamEntry } from "./catalog.js"
import { findPhrase, normalizeQuestion } from "./text_normalize.js"

const NUMBER_WORDS: Record<string, number> = {
	one: 1,
	two: 2,
	three: 3,
	four: 4,
	five: 5,
	six: 6,
	seven: 7,
	eight: 8,
	nine: 9,
	ten: 10,
}

const TOP_N_PATTERN = /(?:^| )(?:top|first) (\d+|one|two|three|four|five|six|seven|eight|nine|ten)(?= |$)/

/**
 * Earliest team mention wins; at the same position the longer form wins
 * ("manchester united" over "manchester").
 */
export function extractTeam(text: string, teams: readonly TeamEntry[]): string | null {
	let best: { name: string; start: number; length: number } | null = null
	for (const team of teams) {
		const forms = [normalizeQuestion(team.name), ...team.aliases]
		for (const form of forms) {
			const [first] = findPhrase(text, form)
			if (!first) continue
			const length = first.end - first.start
			if (!best || first.start < best.start || (first.start === best.start && length > best.length)) {
				best = { name: team.name, start: first.start, length }
			}
		}
	}
	return best ? best.name : null
}

/**
 * Row count from "top N" / "first N" (digits or one..ten). Zero is ignored.
 */
export function extractTopN(text: string): number | null {
	const match = TOP_N_PATTERN.exec(text)
	if (!match) return null
	const raw = match[1]
	const n = raw in NUMBER_WORDS ? NUMBER_WORDS[raw] : parseInt(raw, 10)
	return Number.isInteger(n) && n > 0 ? n : null
}

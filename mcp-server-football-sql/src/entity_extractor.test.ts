import { describe, it, expect } from "vitest"
import type { TeamEntry } from "./catalog.js"
import { extractTeam, extractTopN } from "./entity_extractor.js"

const teams: TeamEntry[] = [
	{ name: "Man City", aliases: ["manchester city", "city"] },
	{ name: "Man United", aliases: ["manchester united", "man utd", "manchester"] },
	{ name: "Nott'm Forest", aliases: ["nottingham forest", "forest"] },
	{ name: "Everton", aliases: ["the toffees"] },
	{ name: "Liverpool", aliases: ["lfc"] },
]

describe("extractTeam", () => {
	it("should match the canonical name", () => {
		expect(extractTeam("how many titles has man united won", teams)).toBe("Man United")
	})

	it("should match aliases", () => {
		expect(extractTeam("top scorer for the toffees", teams)).toBe("Everton")
	})

	it("should normalize the canonical name before matching", () => {
		expect(extractTeam("nott m forest points", teams)).toBe("Nott'm Forest")
	})

	it("should prefer the longer form at the same position", () => {
		expect(extractTeam("manchester united goals", teams)).toBe("Man United")
		expect(extractTeam("manchester city goals", teams)).toBe("Man City")
	})

	it("should take the earliest mention", () => {
		expect(extractTeam("did lfc or everton concede more", teams)).toBe("Liverpool")
		expect(extractTeam("did everton or lfc concede more", teams)).toBe("Everton")
	})

	it("should return null without a team", () => {
		expect(extractTeam("most goals in a season", teams)).toBeNull()
	})
})

describe("extractTopN", () => {
	it("should read digits", () => {
		expect(extractTopN("top 3 scorers for arsenal")).toBe(3)
	})

	it("should read number words", () => {
		expect(extractTopN("first five seasons")).toBe(5)
	})

	it("should ignore zero", () => {
		expect(extractTopN("top 0 teams")).toBeNull()
	})

	it("should ignore top without a count", () => {
		expect(extractTopN("arsenal top scorer")).toBeNull()
	})

	it("should not match inside a longer word", () => {
		expect(extractTopN("non stop 3 wins")).toBeNull()
	})
})

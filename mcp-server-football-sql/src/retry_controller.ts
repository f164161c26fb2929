/**
 * Retry/Escalation Controller
 *
 * Tracks one question through the attempt loop owned by the orchestrator:
 *
 *   PENDING -> ACCEPTED | RETRY
 *   RETRY   -> ACCEPTED | RETRY | EXHAUSTED
 *
 * ACCEPTED and EXHAUSTED are terminal. The controller never loops on its own;
 * it records outcomes and hands back the token the caller should surface.
 */

import type {
	GuardrailRule,
	IntentCategory,
	RelationRef,
	RetryKind,
	RetryToken,
	RouteOutcome,
	RoutingDecision,
	ValidationVerdict,
} from "./catalog_types.js"
import { qualifiedName } from "./catalog.js"
import { FootballSQLError, RETRY_TOKEN_MARKER } from "./config.js"

export type RetryState = "PENDING" | "ACCEPTED" | "RETRY" | "EXHAUSTED"

export interface RetryTokenInit {
	kind: RetryKind
	reason: string
	rule?: GuardrailRule | null
	category: IntentCategory
	candidateSources: readonly RelationRef[]
	originalQuestion: string
}

export function createRetryToken(init: RetryTokenInit): RetryToken {
	return Object.freeze({
		kind: init.kind,
		reason: init.reason,
		rule: init.rule ?? null,
		category: init.category,
		candidateSources: Object.freeze([...init.candidateSources]),
		originalQuestion: init.originalQuestion,
	})
}

/**
 * Token for a rejected candidate. Names the first violated rule and lists the
 * relations the router considered.
 */
export function tokenForVerdict(decision: RoutingDecision, verdict: ValidationVerdict, question: string): RetryToken {
	const rule = verdict.violatedRule
	const issue = verdict.issues.find((i) => i.rule === rule && i.severity === "error")
	const detail = issue ? `: ${issue.message}` : ""
	return createRetryToken({
		kind: rule === "LIMIT_EXCEEDED" ? "LimitExceeded" : "GuardrailViolation",
		reason: `guardrail violation ${rule ?? "UNKNOWN"}${detail}`,
		rule,
		category: decision.category,
		candidateSources: decision.candidates,
		originalQuestion: question,
	})
}

/**
 * Render the stable, user-facing wire form:
 *
 *   <<NEED_SCHEMA_OR_CLARIFICATION_RETRY>>
 *   RETRY_REASON: ...
 *   CANDIDATE_SOURCES: [public.a, public.b]
 *   QUESTION: "..."
 */
export function formatRetryToken(token: RetryToken): string {
	const reason = token.reason.replace(/\s*\n\s*/g, " ")
	const sources = token.candidateSources.map(qualifiedName).join(", ")
	return [
		RETRY_TOKEN_MARKER,
		`RETRY_REASON: ${reason}`,
		`CANDIDATE_SOURCES: [${sources}]`,
		`QUESTION: ${JSON.stringify(token.originalQuestion)}`,
	].join("\n")
}

export class RetryController {
	private current: RetryState = "PENDING"
	private token: RetryToken | null = null
	private rejected = 0

	get state(): RetryState {
		return this.current
	}

	/** Token of the most recent failure, if any */
	get lastToken(): RetryToken | null {
		return this.token
	}

	/** Number of failures recorded so far */
	get failures(): number {
		return this.rejected
	}

	/**
	 * Record the routing outcome. A successful route leaves the state alone;
	 * a retry token moves it to RETRY.
	 */
	recordRouting(outcome: RouteOutcome): RetryToken | null {
		this.assertOpen("recordRouting")
		if (outcome.ok) return null
		return this.fail(outcome.token)
	}

	/**
	 * Record a guardrail verdict for a candidate built from the decision
	 */
	recordVerdict(decision: RoutingDecision, verdict: ValidationVerdict, question: string): RetryToken | null {
		this.assertOpen("recordVerdict")
		if (verdict.ok) {
			this.current = "ACCEPTED"
			return null
		}
		return this.fail(tokenForVerdict(decision, verdict, question))
	}

	/**
	 * Caller gave up. Returns the final token; no rows accompany it.
	 */
	exhaust(): RetryToken {
		if (this.current !== "RETRY" || !this.token) {
			throw new FootballSQLError("transition", `Cannot exhaust from state ${this.current}`, false, {
				state: this.current,
			})
		}
		this.current = "EXHAUSTED"
		return this.token
	}

	private fail(token: RetryToken): RetryToken {
		this.current = "RETRY"
		this.token = token
		this.rejected++
		return token
	}

	private assertOpen(operation: string): void {
		if (this.current === "ACCEPTED" || this.current === "EXHAUSTED") {
			throw new FootballSQLError("transition", `${operation} called in terminal state ${this.current}`, false, {
				state: this.current,
			})
		}
	}
}

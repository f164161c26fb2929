/**
 * Routing Engine
 *
 * Facade over the pure core: classify -> route -> assemble -> validate.
 * Holds only frozen catalog data, so one instance serves any number of
 * concurrent questions. Never retries; `run` returns either an accepted
 * query or the retry token for this single pass.
 */

import type { IntentCategory, RetryToken, RouteOutcome, RoutingDecision, ValidationVerdict } from "./catalog_types.js"
import { loadCatalog, type Catalog } from "./catalog.js"
import { DEFAULTS } from "./config.js"
import { GuardrailValidator } from "./guardrail_validator.js"
import { classifyQuestion, type Classification } from "./intent_classifier.js"
import { MetricLexicon } from "./metric_lexicon.js"
import { assembleQuery } from "./query_assembler.js"
import { RetryController } from "./retry_controller.js"
import { SourceRouter } from "./source_router.js"

export interface EngineOptions {
	defaultLimit: number
	maxLimit: number
}

export type EngineRun =
	| {
			status: "accepted"
			decision: RoutingDecision
			sql: string
			verdict: ValidationVerdict
	  }
	| {
			status: "retry"
			token: RetryToken
			/** Assembled SQL when routing succeeded but validation did not */
			sql?: string
			verdict?: ValidationVerdict
	  }

export class RoutingEngine {
	private readonly lexicon: MetricLexicon
	private readonly router: SourceRouter
	private readonly validator: GuardrailValidator

	constructor(
		readonly catalog: Catalog,
		readonly options: EngineOptions = { defaultLimit: DEFAULTS.defaultLimit, maxLimit: DEFAULTS.maxLimit },
	) {
		this.lexicon = MetricLexicon.fromCatalog(catalog)
		this.router = new SourceRouter(catalog, this.lexicon, { defaultLimit: options.defaultLimit })
		this.validator = new GuardrailValidator(catalog, { maxLimit: options.maxLimit })
	}

	classify(question: string): Classification {
		return classifyQuestion(question, this.catalog.rules)
	}

	classifyAndRoute(question: string): RouteOutcome {
		return this.router.route(this.classify(question), question)
	}

	assemble(decision: RoutingDecision): string {
		return assembleQuery(decision)
	}

	validate(sql: string, target: IntentCategory | RoutingDecision): ValidationVerdict {
		return this.validator.validate(sql, target)
	}

	/**
	 * One pass of the whole pipeline with the assembled SQL as the candidate
	 */
	run(question: string): EngineRun {
		const controller = new RetryController()
		const outcome = this.classifyAndRoute(question)
		const routingToken = controller.recordRouting(outcome)
		if (!outcome.ok) {
			return { status: "retry", token: routingToken ?? outcome.token }
		}

		const sql = this.assemble(outcome.decision)
		const verdict = this.validate(sql, outcome.decision)
		const token = controller.recordVerdict(outcome.decision, verdict, question)
		if (token) {
			return { status: "retry", token, sql, verdict }
		}
		return { status: "accepted", decision: outcome.decision, sql, verdict }
	}
}

/**
 * Load the catalog from disk and build an engine; throws on a bad catalog
 */
export function createEngine(catalogDir: string, options?: EngineOptions): RoutingEngine {
	return new RoutingEngine(loadCatalog(catalogDir), options)
}

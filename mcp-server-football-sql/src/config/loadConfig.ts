/**
 * Unified config loader for the Football SQL server.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > defaults
 *
 * The merged result is validated with zod; an invalid config is fatal.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"
import { DEFAULTS, FootballSQLError } from "../config.js"

// ── Schema ───────────────────────────────────────────────────────────

const positiveInt = z.number().int().positive()

const configSchema = z
	.object({
		database: z
			.object({
				host: z.string().default("localhost"),
				port: positiveInt.default(5432),
				name: z.string().default("football"),
				user: z.string().default("postgres"),
				password: z.string().default(""),
				max_connections: positiveInt.default(5),
				statement_timeout_ms: positiveInt.default(DEFAULTS.statementTimeoutMs),
			})
			.default({}),
		engine: z
			.object({
				default_limit: positiveInt.default(DEFAULTS.defaultLimit),
				max_limit: positiveInt.default(DEFAULTS.maxLimit),
			})
			.default({}),
		sidecar: z
			.object({
				enabled: z.boolean().default(false),
				url: z.string().url().default("http://localhost:8001"),
				timeout_ms: positiveInt.default(DEFAULTS.sidecarTimeoutMs),
			})
			.default({}),
		orchestrator: z
			.object({
				max_attempts: positiveInt.default(DEFAULTS.maxAttempts),
			})
			.default({}),
		catalog: z
			.object({
				dir: z.string().min(1).default("catalog"),
			})
			.default({}),
		logging: z
			.object({
				level: z
					.string()
					.transform((s) => s.toLowerCase())
					.pipe(z.enum(["debug", "info", "warn", "error"]))
					.default("info"),
			})
			.default({}),
	})
	.refine((c) => c.engine.default_limit <= c.engine.max_limit, {
		message: "engine.default_limit must not exceed engine.max_limit",
		path: ["engine", "default_limit"],
	})

// ── Types ────────────────────────────────────────────────────────────

export type FootballSQLConfig = z.infer<typeof configSchema>

export interface LoadConfigOptions {
	/** Directory holding config.yaml; skips the upward search */
	configDir?: string
}

type ConfigTree = Record<string, unknown>

// ── YAML Loading ─────────────────────────────────────────────────────

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function isTree(value: unknown): value is ConfigTree {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function loadYaml(filePath: string): ConfigTree {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	let parsed: unknown
	try {
		parsed = yaml.load(raw)
	} catch (err) {
		throw new FootballSQLError("config", `Cannot parse ${filePath}: ${String(err)}`, false, { path: filePath })
	}
	if (parsed === undefined || parsed === null) return {}
	if (!isTree(parsed)) {
		throw new FootballSQLError("config", `${filePath} must contain a mapping`, false, { path: filePath })
	}
	return parsed
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: ConfigTree, b: ConfigTree): ConfigTree {
	const result: ConfigTree = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isTree(left) && isTree(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envBool(name: string): boolean | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v === "true" || v === "1"
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}

function section(cfg: ConfigTree, key: string): ConfigTree {
	const existing = cfg[key]
	if (isTree(existing)) return existing
	const created: ConfigTree = {}
	cfg[key] = created
	return created
}

function override(target: ConfigTree, key: string, value: unknown): void {
	if (value !== undefined) target[key] = value
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: ConfigTree): void {
	const db = section(cfg, "database")
	override(db, "host", env("DB_HOST"))
	override(db, "port", envInt("DB_PORT"))
	override(db, "name", env("DB_NAME"))
	override(db, "user", env("DB_USER"))
	override(db, "password", env("DB_PASSWORD"))
	override(db, "statement_timeout_ms", envInt("STATEMENT_TIMEOUT_MS"))

	const engine = section(cfg, "engine")
	override(engine, "default_limit", envInt("DEFAULT_LIMIT"))
	override(engine, "max_limit", envInt("MAX_LIMIT"))

	const sidecar = section(cfg, "sidecar")
	override(sidecar, "enabled", envBool("SQL_SIDECAR_ENABLED"))
	override(sidecar, "url", env("SQL_SIDECAR_URL"))
	override(sidecar, "timeout_ms", envInt("SQL_SIDECAR_TIMEOUT_MS"))

	const orchestrator = section(cfg, "orchestrator")
	override(orchestrator, "max_attempts", envInt("MAX_ATTEMPTS"))

	const catalog = section(cfg, "catalog")
	override(catalog, "dir", env("CATALOG_DIR"))

	const logging = section(cfg, "logging")
	override(logging, "level", env("LOG_LEVEL"))
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: FootballSQLConfig | null = null

export function loadConfig(options: LoadConfigOptions = {}): FootballSQLConfig {
	if (_config) return _config

	const configDir = options.configDir ?? env("CONFIG_DIR") ?? findConfigDir()
	let merged: ConfigTree = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)

	const result = configSchema.safeParse(merged)
	if (!result.success) {
		const details = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
		throw new FootballSQLError("config", `Invalid configuration: ${details}`, false, { configDir })
	}

	// catalog.dir is relative to the config directory (or cwd without one)
	const cfg = result.data
	cfg.catalog.dir = path.resolve(configDir ?? process.cwd(), cfg.catalog.dir)

	_config = cfg
	return _config
}

export function getConfig(): FootballSQLConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}

/**
 * Logger
 *
 * Writes to stderr: stdout is reserved for the MCP protocol.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogMeta = Record<string, unknown>

export interface Logger {
	debug(message: string, meta?: LogMeta): void
	info(message: string, meta?: LogMeta): void
	warn(message: string, meta?: LogMeta): void
	error(message: string, meta?: LogMeta): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export function createStderrLogger(level: LogLevel = "info"): Logger {
	const threshold = LEVEL_ORDER[level]
	const write = (lvl: LogLevel, message: string, meta?: LogMeta) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		const tag = `[${lvl.toUpperCase()}]`
		if (meta && Object.keys(meta).length > 0) {
			console.error(tag, message, JSON.stringify(meta))
		} else {
			console.error(tag, message)
		}
	}
	return {
		debug: (message, meta) => write("debug", message, meta),
		info: (message, meta) => write("info", message, meta),
		warn: (message, meta) => write("warn", message, meta),
		error: (message, meta) => write("error", message, meta),
	}
}

/** Discards everything (tests, library use without a host logger) */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}

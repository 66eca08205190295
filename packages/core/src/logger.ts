/**
 * Structured logger shared by every package.
 * One JSON line per entry on stderr, or `[LEVEL] message` in pretty mode.
 */

import { type Config, type LogLevel, LOG_LEVELS, loadConfig } from './config'

export type LogContext = Record<string, unknown>

export type LogSink = (line: string) => void

const defaultSink: LogSink = (line) => console.error(line)

function rank(level: LogLevel | 'silent'): number {
	return LOG_LEVELS.indexOf(level)
}

function describeError(error: unknown): unknown {
	if (error instanceof Error) {
		return { name: error.name, message: error.message }
	}
	return error
}

export class Logger {
	constructor(
		private readonly config: Config,
		private readonly context: LogContext = {},
		private readonly sink: LogSink = defaultSink
	) {}

	isEnabled(level: LogLevel): boolean {
		return rank(level) >= rank(this.config.logLevel)
	}

	private log(level: LogLevel, message: string, context?: LogContext): void {
		if (!this.isEnabled(level)) return

		const merged = { ...this.context, ...context }
		if (this.config.logFormat === 'pretty') {
			const suffix = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : ''
			this.sink(`[${level.toUpperCase()}] ${message}${suffix}`)
			return
		}

		this.sink(JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...merged }))
	}

	debug(message: string, context?: LogContext): void {
		this.log('debug', message, context)
	}

	info(message: string, context?: LogContext): void {
		this.log('info', message, context)
	}

	warn(message: string, context?: LogContext): void {
		this.log('warn', message, context)
	}

	error(message: string, error?: unknown, context?: LogContext): void {
		this.log('error', message, error === undefined ? context : { ...context, error: describeError(error) })
	}

	/**
	 * Logger that adds `context` to every entry
	 */
	child(context: LogContext): Logger {
		return new Logger(this.config, { ...this.context, ...context }, this.sink)
	}
}

// Singleton logger instance
export const logger = new Logger(loadConfig())

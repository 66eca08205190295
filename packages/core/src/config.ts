export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogFormat = 'json' | 'pretty'

export interface Config {
	/** Entries below this level are dropped; `silent` drops everything */
	logLevel: LogLevel | 'silent'
	logFormat: LogFormat
}

export const LOG_LEVELS: readonly (LogLevel | 'silent')[] = ['debug', 'info', 'warn', 'error', 'silent']

const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty']

export const DEFAULT_CONFIG: Readonly<Config> = Object.freeze({
	logLevel: 'warn',
	logFormat: 'json',
})

export type Env = Readonly<Record<string, string | undefined>>

function pick<T extends string>(
	env: Env,
	name: string,
	allowed: readonly T[],
	fallback: T
): T {
	const raw = env[name]?.trim().toLowerCase()
	if (raw === undefined || raw === '') return fallback
	const match = allowed.find((value) => value === raw)
	if (match === undefined) {
		throw new Error(`${name} must be one of ${allowed.join(', ')} (got "${raw}")`)
	}
	return match
}

/**
 * Read MIMEWISE_LOG_LEVEL and MIMEWISE_LOG_FORMAT
 */
export function loadConfig(env: Env = process.env): Config {
	return {
		logLevel: pick(env, 'MIMEWISE_LOG_LEVEL', LOG_LEVELS, DEFAULT_CONFIG.logLevel),
		logFormat: pick(env, 'MIMEWISE_LOG_FORMAT', LOG_FORMATS, DEFAULT_CONFIG.logFormat),
	}
}

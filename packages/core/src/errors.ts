/**
 * Error kinds raised by every fallible entry point
 */
export type MimeErrorCode =
	| 'UnknownExtension'
	| 'UnknownContent'
	| 'ParseError'
	| 'InvalidScheme'
	| 'DecodeError'
	| 'IoError'
	| 'FeatureDisabled'

/**
 * Typed, catchable failure carrying the offending input in `context`
 */
export class MimeError extends Error {
	constructor(
		message: string,
		public readonly code: MimeErrorCode,
		public readonly context: Readonly<Record<string, unknown>> = {},
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.name = 'MimeError'
	}
}

/**
 * Type guard for MimeError, optionally narrowed to one code
 */
export function isMimeError(error: unknown, code?: MimeErrorCode): error is MimeError {
	if (!(error instanceof MimeError)) return false
	return code === undefined || error.code === code
}

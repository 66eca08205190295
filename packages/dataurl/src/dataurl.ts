import { readFileSync } from 'node:fs'
import { MediaType, MimeError, logger } from '@mimewise/core'
import { extensionOf } from '@mimewise/extension'
import { sniffMediaType } from '@mimewise/magic'
import { isTextual } from '@mimewise/texture'
import { decodeBase64, encodeBase64, percentDecode, percentEncode } from './encoding'
import { type GuessOptions, guessMediaType } from './guess'

export type DataUrlEncoding = 'base64' | 'percent'

/**
 * Decoded data URL. `data` is always an owned copy.
 */
export interface DataUrl {
	readonly mediaType: MediaType
	readonly data: Uint8Array
	readonly encoding: DataUrlEncoding
}

/** Media type of a data URL whose header names none */
export const DEFAULT_DATA_URL_TYPE = MediaType.parse('text/plain;charset=US-ASCII')

const SCHEME = /^data:/i

const BASE64_FLAG = /;\s*base64$/i

const log = logger.child({ component: 'dataurl' })

/**
 * Build a data URL value. Textual types with UTF-8 content are
 * percent-encoded, everything else base64.
 */
export function createDataUrl(data: Uint8Array, mediaType: MediaType, encoding?: DataUrlEncoding): DataUrl {
	return Object.freeze({
		mediaType,
		data: new Uint8Array(data),
		encoding: encoding ?? (isTextual(mediaType, data) ? 'percent' : 'base64'),
	})
}

/**
 * Data URL typed by sniffing the content's magic bytes
 */
export function fromData(data: Uint8Array): DataUrl {
	return createDataUrl(data, sniffMediaType(data))
}

/**
 * Read a file whole and type it by extension, then content
 */
export function readDataUrl(path: string, options?: GuessOptions): DataUrl {
	let data: Uint8Array
	try {
		data = readFileSync(path)
	} catch (error) {
		const code = errnoCode(error)
		log.debug('Failed to read file', { path, code })
		throw new MimeError(`Cannot read "${path}"`, 'IoError', { path, code }, { cause: error })
	}

	return createDataUrl(data, guessMediaType(extensionOf(path), data, options))
}

export function formatDataUrl(url: DataUrl): string {
	if (url.encoding === 'base64') {
		return `data:${url.mediaType};base64,${encodeBase64(url.data)}`
	}
	return `data:${url.mediaType},${percentEncode(url.data)}`
}

export function parseDataUrl(text: string): DataUrl {
	try {
		return parse(text)
	} catch (error) {
		if (error instanceof MimeError) log.debug('Failed to parse data URL', { code: error.code, ...error.context })
		throw error
	}
}

export function dataUrlEquals(a: DataUrl, b: DataUrl): boolean {
	if (!a.mediaType.equals(b.mediaType) || a.data.length !== b.data.length) return false
	return a.data.every((byte, i) => byte === b.data[i])
}

function parse(text: string): DataUrl {
	if (!SCHEME.test(text)) {
		throw new MimeError('Data URL must start with "data:"', 'InvalidScheme', { input: text.slice(0, 32) })
	}

	const comma = headerEnd(text)
	if (comma === -1) {
		throw new MimeError('Invalid data URL: missing ","', 'DecodeError', { reason: 'missing ","' })
	}

	let header = text.slice(5, comma).trim()
	let encoding: DataUrlEncoding = 'percent'
	if (BASE64_FLAG.test(header)) {
		encoding = 'base64'
		header = header.replace(BASE64_FLAG, '').trim()
	}

	const payload = text.slice(comma + 1)
	return Object.freeze({
		mediaType: parseHeader(header),
		data: encoding === 'base64' ? decodeBase64(payload) : percentDecode(payload),
		encoding,
	})
}

/**
 * First comma after the scheme that is not inside a quoted parameter value
 */
function headerEnd(text: string): number {
	let quoted = false
	for (let i = 5; i < text.length; i++) {
		const ch = text[i]
		if (quoted && ch === '\\') i++
		else if (ch === '"') quoted = !quoted
		else if (ch === ',' && !quoted) return i
	}
	return -1
}

function parseHeader(header: string): MediaType {
	if (header === '') return DEFAULT_DATA_URL_TYPE
	if (header.startsWith(';')) return MediaType.parse(`text/plain${header}`)
	return MediaType.parse(header)
}

function errnoCode(error: unknown): string | undefined {
	if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code
	return undefined
}

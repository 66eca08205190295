import { isUtf8 as isValidUtf8 } from 'node:buffer'
import type { MediaType } from '@mimewise/core'

const TEXTUAL_SUBTYPES: ReadonlySet<string> = new Set(['json', 'json5', 'xml', 'javascript', 'ecmascript'])

const TEXTUAL_SUFFIXES: ReadonlySet<string> = new Set(['json', 'xml'])

/**
 * text/*, JSON, XML, JavaScript, and +json / +xml types
 */
export function isTextualMediaType(mediaType: MediaType): boolean {
	if (mediaType.type === 'text') return true
	if (TEXTUAL_SUBTYPES.has(mediaType.subtype)) return true
	const suffix = mediaType.suffix
	return suffix !== undefined && TEXTUAL_SUFFIXES.has(suffix)
}

/**
 * Strict UTF-8 check of the whole buffer
 */
export function isUtf8(data: Uint8Array): boolean {
	return isValidUtf8(data)
}

function isContinuation(byte: number | undefined): boolean {
	return byte !== undefined && (byte & 0b1100_0000) === 0b1000_0000
}

/**
 * Scan at most `limit` bytes for UTF-8 sequence structure.
 * Cheaper than `isUtf8` on large buffers; a sequence cut by the limit is
 * checked against the bytes that follow it.
 */
export function isUtf8Prefix(data: Uint8Array, limit = 512): boolean {
	const end = Math.min(limit, data.length)
	let i = 0

	while (i < end) {
		const byte = data[i] ?? 0
		let length: number

		if (byte < 0x80) length = 1
		else if ((byte & 0b1110_0000) === 0b1100_0000) length = 2
		else if ((byte & 0b1111_0000) === 0b1110_0000) length = 3
		else if ((byte & 0b1111_1000) === 0b1111_0000) length = 4
		else return false

		for (let k = 1; k < length; k++) {
			if (!isContinuation(data[i + k])) return false
		}
		i += length
	}

	return true
}

/**
 * Textual media type carrying valid UTF-8
 */
export function isTextual(mediaType: MediaType, data: Uint8Array): boolean {
	return isTextualMediaType(mediaType) && isUtf8(data)
}

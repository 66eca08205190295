/**
 * Base64 and percent-encoding for data URL payloads.
 * Both decoders are strict and throw a DecodeError MimeError.
 */

import { MimeError } from '@mimewise/core'

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/

const HEX_PAIR = /^[0-9A-Fa-f]{2}$/

/** Bytes left as-is by encodeURIComponent */
const UNRESERVED = /^[A-Za-z0-9\-_.!~*'()]$/

const encoder = new TextEncoder()

function decodeError(reason: string, context: Record<string, unknown>): MimeError {
	return new MimeError(`Invalid data URL payload: ${reason}`, 'DecodeError', { reason, ...context })
}

/**
 * Standard alphabet, padded, no line wrapping
 */
export function encodeBase64(data: Uint8Array): string {
	return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64')
}

export function decodeBase64(text: string): Uint8Array {
	if (text.length % 4 !== 0) {
		throw decodeError('base64 length is not a multiple of 4', { length: text.length })
	}
	if (!BASE64.test(text)) {
		throw decodeError('illegal base64 character or padding', { length: text.length })
	}
	return new Uint8Array(Buffer.from(text, 'base64'))
}

/**
 * Percent-encode every byte outside the URI unreserved set.
 * For UTF-8 text this matches `encodeURIComponent`.
 */
export function percentEncode(data: Uint8Array): string {
	let out = ''
	for (const byte of data) {
		const ch = String.fromCharCode(byte)
		out += byte < 0x80 && UNRESERVED.test(ch) ? ch : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`
	}
	return out
}

/**
 * Decode `%XX` escapes to bytes; other characters become their UTF-8 bytes
 */
export function percentDecode(text: string): Uint8Array {
	const out: number[] = []
	let i = 0

	while (i < text.length) {
		const pct = text.indexOf('%', i)
		const end = pct === -1 ? text.length : pct
		if (end > i) {
			for (const byte of encoder.encode(text.slice(i, end))) out.push(byte)
		}
		if (pct === -1) break

		const hex = text.slice(pct + 1, pct + 3)
		if (!HEX_PAIR.test(hex)) {
			throw decodeError(`malformed percent escape at ${pct}`, { position: pct })
		}
		out.push(Number.parseInt(hex, 16))
		i = pct + 3
	}

	return Uint8Array.from(out)
}

import { type MediaType, MimeError } from '@mimewise/core'
import {
	type MagicSignature,
	type SignatureEntry,
	compareSignatures,
	compileSignature,
	matchSignature,
} from './signature'
import database from './signatures.json'

/**
 * Content sniffer over an ordered signature database
 */
export interface ContentSniffer {
	/** Signatures in match order */
	readonly signatures: readonly MagicSignature[]
	/** Bytes of input inspected at most */
	readonly prefixLength: number
	detect(data: Uint8Array): MediaType | null
}

export function createSniffer(entries: readonly SignatureEntry[]): ContentSniffer {
	const signatures = Object.freeze(entries.map(compileSignature).sort(compareSignatures))
	const prefixLength = signatures.reduce((max, s) => Math.max(max, s.offset + s.bytes.length), 0)

	return Object.freeze({
		signatures,
		prefixLength,
		detect(data: Uint8Array): MediaType | null {
			const prefix = data.subarray(0, prefixLength)
			for (const signature of signatures) {
				if (matchSignature(prefix, signature)) return signature.mediaType
			}
			return null
		},
	})
}

export const defaultSniffer: ContentSniffer = createSniffer(database)

/**
 * Detect media type from binary data, null when nothing matches
 */
export function detectMediaType(data: Uint8Array, sniffer: ContentSniffer = defaultSniffer): MediaType | null {
	return sniffer.detect(data)
}

/**
 * Detect media type from binary data, throwing UnknownContent when nothing matches
 */
export function sniffMediaType(data: Uint8Array, sniffer: ContentSniffer = defaultSniffer): MediaType {
	const type = sniffer.detect(data)
	if (type === null) {
		const inspected = Math.min(data.length, sniffer.prefixLength)
		throw new MimeError('No signature matched the content', 'UnknownContent', {
			inspected,
			head: Array.from(data.subarray(0, Math.min(inspected, 16))),
		})
	}
	return type
}

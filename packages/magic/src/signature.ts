import { MediaType } from '@mimewise/core'

/**
 * Signature as stored in the database.
 * `pattern` is space-separated hex bytes, `??` for a wildcard.
 * `mask` (optional) is ANDed with both sides before comparing.
 */
export interface SignatureEntry {
	mediaType: string
	pattern: string
	mask?: string
	offset?: number
	priority?: number
}

export interface MagicSignature {
	readonly mediaType: MediaType
	readonly bytes: readonly number[]
	readonly mask: readonly number[]
	readonly offset: number
	readonly priority: number
	/** Number of bytes that are not wildcards */
	readonly specificity: number
}

const HEX_BYTE = /^[0-9a-fA-F]{2}$/

function parseHex(token: string, entry: SignatureEntry): number {
	if (!HEX_BYTE.test(token)) {
		throw new Error(`Invalid byte "${token}" in signature for ${entry.mediaType}`)
	}
	return Number.parseInt(token, 16)
}

/**
 * Compile a database entry. Throws on a malformed entry.
 */
export function compileSignature(entry: SignatureEntry): MagicSignature {
	const tokens = entry.pattern.trim().split(/\s+/)
	const bytes = tokens.map((token) => (token === '??' ? 0x00 : parseHex(token, entry)))
	let mask: number[] = tokens.map((token) => (token === '??' ? 0x00 : 0xff))

	if (entry.mask !== undefined) {
		const explicit = entry.mask.trim().split(/\s+/).map((token) => parseHex(token, entry))
		if (explicit.length !== bytes.length) {
			throw new Error(`Mask length does not match pattern for ${entry.mediaType}`)
		}
		mask = mask.map((m, i) => m & (explicit[i] ?? 0xff))
	}

	const offset = entry.offset ?? 0
	if (!Number.isInteger(offset) || offset < 0) {
		throw new Error(`Invalid offset ${offset} in signature for ${entry.mediaType}`)
	}

	return Object.freeze({
		mediaType: MediaType.parse(entry.mediaType),
		bytes: Object.freeze(bytes),
		mask: Object.freeze(mask),
		offset,
		priority: entry.priority ?? 0,
		specificity: mask.filter((m) => m !== 0x00).length,
	})
}

/**
 * Higher priority first, then more specific, otherwise equal
 * (a stable sort keeps database order).
 */
export function compareSignatures(a: MagicSignature, b: MagicSignature): number {
	if (a.priority !== b.priority) return b.priority - a.priority
	return b.specificity - a.specificity
}

/**
 * Check if bytes match magic signature
 */
export function matchSignature(data: Uint8Array, signature: MagicSignature): boolean {
	const { bytes, mask, offset } = signature
	if (data.length < offset + bytes.length) return false

	for (let i = 0; i < bytes.length; i++) {
		const m = mask[i] ?? 0xff
		if (((data[offset + i] ?? 0) & m) !== ((bytes[i] ?? 0) & m)) return false
	}
	return true
}

import { MediaType, logger } from '@mimewise/core'
import { type ExtensionTable, lightExtensions, normalizeExtension } from '@mimewise/extension'
import { type ContentSniffer, defaultSniffer } from '@mimewise/magic'
import { isUtf8 } from '@mimewise/texture'

export const TEXT_PLAIN = MediaType.parse('text/plain')

export const OCTET_STREAM = MediaType.parse('application/octet-stream')

export interface GuessOptions {
	/** Tables tried in order. Default: the light table. */
	extensions?: readonly ExtensionTable[]
	/** Content sniffer, or null to skip sniffing */
	sniffer?: ContentSniffer | null
	/** Fall back to text/plain for UTF-8 content. Default: true. */
	textFallback?: boolean
}

const log = logger.child({ component: 'guess' })

/**
 * Extension tables, then magic bytes, then text/plain for UTF-8 content,
 * else application/octet-stream. Never fails.
 */
export function guessMediaType(
	extension: string | undefined,
	data: Uint8Array,
	options: GuessOptions = {}
): MediaType {
	const { extensions = [lightExtensions], sniffer = defaultSniffer, textFallback = true } = options

	if (extension !== undefined) {
		const normalized = normalizeExtension(extension)
		for (const table of extensions) {
			const type = normalized === '' ? undefined : table.lookup(normalized)
			if (type !== undefined) {
				log.debug('Resolved by extension', { extension, table: table.name, type: type.essence })
				return type
			}
		}
	}

	if (sniffer !== null) {
		const type = sniffer.detect(data)
		if (type !== null) {
			log.debug('Resolved by content', { extension, type: type.essence })
			return type
		}
	}

	const type = textFallback && isUtf8(data) ? TEXT_PLAIN : OCTET_STREAM
	log.debug('Fell back to default type', { extension, type: type.essence })
	return type
}

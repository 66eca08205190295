import { MediaType } from '@mimewise/core'
import mime from 'mime-types'
import type { ExtensionTable } from './types'

/**
 * Broad extension table backed by the mime-db catalog.
 * Keys are matched exactly; `mime.lookup` would take the last dot of a path.
 */
export const fullExtensions: ExtensionTable = Object.freeze({
	name: 'full',
	lookup(extension: string): MediaType | undefined {
		const type = Object.hasOwn(mime.types, extension) ? mime.types[extension] : undefined
		return type === undefined ? undefined : MediaType.parse(type)
	},
})

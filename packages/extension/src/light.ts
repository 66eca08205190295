/**
 * Curated table of common web extensions.
 * Entries are parsed once at load and frozen; a lookup is one own-property read.
 */

import { MediaType } from '@mimewise/core'
import table from './light.json'
import type { ExtensionTable } from './types'

export const LIGHT_EXTENSIONS: Readonly<Record<string, MediaType>> = Object.freeze(
	Object.fromEntries(Object.entries(table).map(([ext, type]): [string, MediaType] => [ext, MediaType.parse(type)]))
)

export const lightExtensions: ExtensionTable = Object.freeze({
	name: 'light',
	lookup(extension: string): MediaType | undefined {
		return Object.hasOwn(LIGHT_EXTENSIONS, extension) ? LIGHT_EXTENSIONS[extension] : undefined
	},
})

import type { MediaType } from '@mimewise/core'

export type ExtensionTableName = 'light' | 'full'

/**
 * Extension to media type lookup.
 * `lookup` takes a normalized extension (no leading dot, lower-case).
 */
export interface ExtensionTable {
	readonly name: ExtensionTableName
	lookup(extension: string): MediaType | undefined
}

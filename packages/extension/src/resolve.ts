import { extname } from 'node:path'
import { type MediaType, MimeError } from '@mimewise/core'
import type { ExtensionTable } from './types'

/**
 * Strip a leading dot and lower-case
 */
export function normalizeExtension(extension: string): string {
	const bare = extension.startsWith('.') ? extension.slice(1) : extension
	return bare.toLowerCase()
}

/**
 * Extension of the final path segment, without the dot.
 * Dotfiles (`.bashrc`) and names ending in a dot have none.
 */
export function extensionOf(path: string): string | undefined {
	const name = path.slice(Math.max(path.lastIndexOf('/'), path.lastIndexOf('\\')) + 1)
	const ext = extname(name)
	return ext.length > 1 ? ext.slice(1) : undefined
}

export function resolveExtension(table: ExtensionTable, extension: string): MediaType {
	const normalized = normalizeExtension(extension)
	const type = normalized === '' ? undefined : table.lookup(normalized)
	if (type === undefined) {
		throw new MimeError(`No media type found for extension "${extension}"`, 'UnknownExtension', {
			extension,
			table: table.name,
		})
	}
	return type
}

export function resolvePath(table: ExtensionTable, path: string): MediaType {
	const extension = extensionOf(path)
	const type = extension === undefined ? undefined : table.lookup(normalizeExtension(extension))
	if (type === undefined) {
		const reason = extension === undefined ? 'no extension' : `unknown extension "${extension}"`
		throw new MimeError(`No media type found for path "${path}": ${reason}`, 'UnknownExtension', {
			path,
			extension,
			table: table.name,
		})
	}
	return type
}

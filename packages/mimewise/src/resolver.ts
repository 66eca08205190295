import { MediaType, MimeError } from '@mimewise/core'
import {
	type DataUrl,
	type GuessOptions,
	createDataUrl,
	guessMediaType,
	parseDataUrl,
	readDataUrl,
} from '@mimewise/dataurl'
import {
	type ExtensionTable,
	extensionOf,
	fullExtensions,
	lightExtensions,
	normalizeExtension,
	resolveExtension,
	resolvePath,
} from '@mimewise/extension'
import { defaultSniffer, sniffMediaType } from '@mimewise/magic'
import { isTextual, isTextualMediaType, isTexture } from '@mimewise/texture'
import { type FeatureName, type Features, resolveFeatures } from './features'

/**
 * Resolution entry points bound to one capability set.
 * Entry points of a disabled capability throw FeatureDisabled.
 */
export interface MimeResolver {
	readonly features: Readonly<Features>
	/** Enabled extension tables, light first */
	readonly extensionTables: readonly ExtensionTable[]
	fromExtension(extension: string): MediaType
	fromExtensionLight(extension: string): MediaType
	fromPath(path: string): MediaType
	fromPathLight(path: string): MediaType
	/** Path through every enabled table, light first */
	resolvePath(path: string): MediaType
	fromContent(data: Uint8Array): MediaType
	fromString(literal: string): MediaType
	/** Extension tables, magic bytes, then a default type. Never fails. */
	fromExtensionAndContent(extension: string | undefined, data: Uint8Array): MediaType
	isTexture(mediaType: MediaType): boolean
	isTextual(mediaType: MediaType, data?: Uint8Array): boolean
	createDataUrl(data: Uint8Array, mediaType: MediaType): DataUrl
	parseDataUrl(text: string): DataUrl
	readDataUrl(path: string): DataUrl
}

function gate<A extends unknown[], R>(
	enabled: boolean,
	feature: FeatureName,
	fn: (...args: A) => R
): (...args: A) => R {
	if (enabled) return fn
	return () => {
		throw new MimeError(`Feature "${feature}" is not enabled`, 'FeatureDisabled', { feature })
	}
}

export function createMimeResolver(overrides: Partial<Features> = {}): MimeResolver {
	const features = resolveFeatures(overrides)

	const tables: ExtensionTable[] = []
	if (features.extensionLight) tables.push(lightExtensions)
	if (features.extension) tables.push(fullExtensions)
	const extensionTables = Object.freeze(tables)

	const guessOptions: GuessOptions = {
		extensions: extensionTables,
		sniffer: features.magic ? defaultSniffer : null,
		textFallback: features.texture,
	}

	const resolvePreferred = (path: string): MediaType => {
		const [first] = extensionTables
		if (first === undefined) {
			throw new MimeError('No extension table is enabled', 'FeatureDisabled', { feature: 'extension-light' })
		}
		const extension = extensionOf(path)
		if (extension !== undefined) {
			const normalized = normalizeExtension(extension)
			for (const table of extensionTables) {
				const type = table.lookup(normalized)
				if (type !== undefined) return type
			}
		}
		// reports the missing or unknown extension
		return resolvePath(first, path)
	}

	return Object.freeze({
		features,
		extensionTables,
		fromExtension: gate(features.extension, 'extension', (extension: string) =>
			resolveExtension(fullExtensions, extension)
		),
		fromExtensionLight: gate(features.extensionLight, 'extension-light', (extension: string) =>
			resolveExtension(lightExtensions, extension)
		),
		fromPath: gate(features.extension, 'extension', (path: string) => resolvePath(fullExtensions, path)),
		fromPathLight: gate(features.extensionLight, 'extension-light', (path: string) =>
			resolvePath(lightExtensions, path)
		),
		resolvePath: resolvePreferred,
		fromContent: gate(features.magic, 'magic', (data: Uint8Array) => sniffMediaType(data)),
		fromString: (literal: string) => MediaType.parse(literal),
		fromExtensionAndContent: (extension: string | undefined, data: Uint8Array) =>
			guessMediaType(extension, data, guessOptions),
		isTexture: gate(features.texture, 'texture', (mediaType: MediaType) => isTexture(mediaType)),
		isTextual: gate(features.texture, 'texture', (mediaType: MediaType, data?: Uint8Array) =>
			data === undefined ? isTextualMediaType(mediaType) : isTextual(mediaType, data)
		),
		createDataUrl: gate(features.dataurl, 'dataurl', (data: Uint8Array, mediaType: MediaType) =>
			createDataUrl(data, mediaType)
		),
		parseDataUrl: gate(features.dataurl, 'dataurl', (text: string) => parseDataUrl(text)),
		readDataUrl: gate(features.dataurl, 'dataurl', (path: string) => readDataUrl(path, guessOptions)),
	})
}

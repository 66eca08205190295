import type { MediaType } from '@mimewise/core'

/**
 * Raster image formats usable as a rendering source
 */
export const TEXTURE_TYPES: ReadonlySet<string> = new Set([
	'image/png',
	'image/jpeg',
	'image/gif',
	'image/webp',
	'image/avif',
	'image/bmp',
	'image/tiff',
	'image/x-icon',
	'image/vnd.microsoft.icon',
	'image/heic',
	'image/heif',
	'image/jxl',
	'image/ktx',
	'image/ktx2',
	'image/x-tga',
	'image/qoi',
	'image/vnd.adobe.photoshop',
	'image/vnd.ms-dds',
	'image/x-portable-pixmap',
	'image/x-portable-graymap',
	'image/x-portable-bitmap',
])

/**
 * image/* subtypes that are vector or metafile formats, not textures
 */
export const NON_TEXTURE_IMAGE_SUBTYPES: ReadonlySet<string> = new Set([
	'svg+xml',
	'emf',
	'x-emf',
	'wmf',
	'x-wmf',
	'cgm',
])

export type TextureClassifierName = 'fast' | 'structural'

export interface TextureClassifier {
	readonly name: TextureClassifierName
	isTexture(mediaType: MediaType): boolean
}

/**
 * Exact membership in TEXTURE_TYPES
 */
export const fastTextureClassifier: TextureClassifier = Object.freeze({
	name: 'fast',
	isTexture: (mediaType: MediaType) => TEXTURE_TYPES.has(mediaType.essence),
})

/**
 * Any image/* type outside the vector deny-list
 */
export const structuralTextureClassifier: TextureClassifier = Object.freeze({
	name: 'structural',
	isTexture: (mediaType: MediaType) =>
		mediaType.type === 'image' && !NON_TEXTURE_IMAGE_SUBTYPES.has(mediaType.subtype),
})

/**
 * Fast path first; image types the static set does not list fall through
 * to the structural check.
 */
export function isTexture(mediaType: MediaType): boolean {
	return fastTextureClassifier.isTexture(mediaType) || structuralTextureClassifier.isTexture(mediaType)
}

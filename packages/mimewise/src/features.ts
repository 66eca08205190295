import type { Env } from '@mimewise/core'

export type FeatureName = 'extension' | 'extension-light' | 'magic' | 'texture' | 'dataurl'

/**
 * Capability set of a resolver
 */
export interface Features {
	/** Full extension table (mime-types) */
	extension: boolean
	/** Curated extension table */
	extensionLight: boolean
	magic: boolean
	texture: boolean
	/** Data URL codec; implies extensionLight, magic and texture */
	dataurl: boolean
}

const FEATURE_KEYS: Readonly<Record<FeatureName, keyof Features>> = {
	extension: 'extension',
	'extension-light': 'extensionLight',
	magic: 'magic',
	texture: 'texture',
	dataurl: 'dataurl',
}

export const ALL_FEATURES: Readonly<Features> = Object.freeze({
	extension: true,
	extensionLight: true,
	magic: true,
	texture: true,
	dataurl: true,
})

const NO_FEATURES: Readonly<Features> = Object.freeze({
	extension: false,
	extensionLight: false,
	magic: false,
	texture: false,
	dataurl: false,
})

function isFeatureName(name: string): name is FeatureName {
	return Object.hasOwn(FEATURE_KEYS, name)
}

/**
 * Apply overrides to the full set and add what `dataurl` implies
 */
export function resolveFeatures(overrides: Partial<Features> = {}): Readonly<Features> {
	// per key, so an explicit undefined keeps the default
	const features: Features = {
		extension: overrides.extension ?? ALL_FEATURES.extension,
		extensionLight: overrides.extensionLight ?? ALL_FEATURES.extensionLight,
		magic: overrides.magic ?? ALL_FEATURES.magic,
		texture: overrides.texture ?? ALL_FEATURES.texture,
		dataurl: overrides.dataurl ?? ALL_FEATURES.dataurl,
	}
	if (features.dataurl) {
		features.extensionLight = true
		features.magic = true
		features.texture = true
	}
	return Object.freeze(features)
}

/**
 * Parse a comma-separated list such as `extension-light,magic`.
 * Only the listed features (and their implications) are enabled.
 */
export function parseFeatureList(list: string): Readonly<Features> {
	const features: Features = { ...NO_FEATURES }
	for (const raw of list.split(',')) {
		const name = raw.trim().toLowerCase()
		if (name === '') continue
		if (!isFeatureName(name)) {
			throw new Error(`Unknown feature "${name}" (expected one of ${Object.keys(FEATURE_KEYS).join(', ')})`)
		}
		features[FEATURE_KEYS[name]] = true
	}
	return resolveFeatures(features)
}

/**
 * MIMEWISE_FEATURES, or every feature when unset
 */
export function loadFeatures(env: Env = process.env): Readonly<Features> {
	const list = env.MIMEWISE_FEATURES
	if (list === undefined || list.trim() === '') return resolveFeatures()
	return parseFeatureList(list)
}

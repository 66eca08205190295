/**
 * mimewise - media type resolution by extension, magic bytes or literal,
 * texture classification, and a data URL codec.
 */

// Re-export the capability packages
export * from '@mimewise/core'
export * from '@mimewise/dataurl'
export * from '@mimewise/extension'
export * from '@mimewise/magic'
export * from '@mimewise/texture'

// Main API
export { type FeatureName, type Features, ALL_FEATURES, loadFeatures, parseFeatureList, resolveFeatures } from './features'
export { Mime, defaultResolver } from './mime'
export { type MimeResolver, createMimeResolver } from './resolver'

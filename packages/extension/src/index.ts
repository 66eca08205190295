/**
 * Extension tables
 *
 * - `lightExtensions`: curated common web types, cheapest lookup
 * - `fullExtensions`: the mime-db catalog via mime-types
 */

export * from './full'
export * from './light'
export * from './resolve'
export * from './types'

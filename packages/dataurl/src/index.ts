/**
 * Data URL codec
 *
 * `data:<type>;base64,<payload>` for binary content,
 * `data:<type>,<percent-encoded>` for textual content.
 */

export * from './dataurl'
export * from './encoding'
export * from './guess'

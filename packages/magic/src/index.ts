/**
 * Magic-number content sniffing
 *
 * Signatures come from `signatures.json` and are tried by priority, then by
 * specificity. `createSniffer` accepts any other database of the same shape.
 */

export * from './signature'
export * from './sniffer'

export * from './textual'
export * from './texture'

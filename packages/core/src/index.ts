export * from './config'
export * from './errors'
export * from './logger'
export * from './media-type'

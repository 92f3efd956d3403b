/**
 * Core audio types, errors and byte streams
 */

export * from './buffer'
export * from './container'
export * from './errors'
export * from './format'
export * from './io'
export type * from './types'

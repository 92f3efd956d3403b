/**
 * WAV codec
 */

export * from './codec'
export * from './decoder'
export * from './encoder'
export * from './types'

/**
 * FLAC codec
 */

export * from './bitstream'
export * from './channels'
export * from './codec'
export * from './crc'
export * from './decoder'
export * from './encoder'
export * from './header'
export * from './predictor'
export * from './residual'
export * from './stream'
export * from './streaminfo'
export * from './subframe'
export * from './types'

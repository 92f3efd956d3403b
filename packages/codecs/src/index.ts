/**
 * @pcmkit/codecs - Audio container codecs
 */

export * from './flac'
export * from './registry'
export * from './wav'

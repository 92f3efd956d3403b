/**
 * Codec registry
 * Picks a codec by file extension, then by magic bytes
 */

import {
	type AudioContainer,
	type AudioInput,
	CodecNotFoundError,
	containerFromPath,
	detectContainer,
	peekInput,
} from '@pcmkit/core'
import { FlacCodec } from './flac/codec'
import type { FlacReadOptions, FlacWriteOptions } from './flac/types'
import { WavCodec } from './wav/codec'

export type SupportedCodec = FlacCodec | WavCodec

/** Enough leading bytes for every magic signature */
const SNIFF_LENGTH = 12

export interface RegistryOptions {
	flacRead?: FlacReadOptions
	flacWrite?: FlacWriteOptions
}

export function codecForContainer(container: AudioContainer, options: RegistryOptions = {}): SupportedCodec {
	switch (container) {
		case 'flac':
			return new FlacCodec(options.flacRead, options.flacWrite)
		case 'wav':
			return new WavCodec()
	}
}

/**
 * Codec for a path's extension
 */
export function codecForPath(path: string, options: RegistryOptions = {}): SupportedCodec {
	const container = containerFromPath(path)
	if (!container) {
		throw new CodecNotFoundError(`no codec for file extension: ${path}`, path)
	}
	return codecForContainer(container, options)
}

/**
 * Codec that can read an input. Paths are matched by extension first;
 * anything else falls back to its leading bytes (RIFF/WAVE before fLaC).
 */
export function detectCodec(input: AudioInput, options: RegistryOptions = {}): SupportedCodec {
	const fromPath = typeof input === 'string' ? containerFromPath(input) : null
	const container = fromPath ?? detectContainer(peekInput(input, SNIFF_LENGTH))
	if (!container) {
		const target = typeof input === 'string' ? input : undefined
		throw new CodecNotFoundError(`no codec recognises ${target ?? 'input'}`, target)
	}
	return codecForContainer(container, options)
}

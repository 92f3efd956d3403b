import { InvalidFormatError, UnsupportedFormatError } from './errors'
import type { AudioFormat, SampleFormat } from './types'

/**
 * Allowed bit depths per sample representation
 */
const BIT_DEPTHS: Record<SampleFormat, readonly number[]> = {
	pcm: [8, 16, 24, 32],
	float: [32, 64],
}

export interface FormatOptions {
	channels: number
	sampleRate: number
	bitDepth: number
	sampleFormat?: string
}

function isSampleFormat(value: string): value is SampleFormat {
	return value === 'pcm' || value === 'float'
}

/**
 * Create a validated, frozen audio format
 */
export function createFormat(options: FormatOptions): AudioFormat {
	const { channels, sampleRate, bitDepth, sampleFormat = 'pcm' } = options

	if (!Number.isInteger(channels) || channels < 1 || channels > 32) {
		throw new InvalidFormatError(`channels must be an integer between 1 and 32: ${channels}`)
	}
	if (!Number.isInteger(sampleRate) || sampleRate < 8000 || sampleRate > 768000) {
		throw new InvalidFormatError(`sample rate must be an integer between 8000 and 768000: ${sampleRate}`)
	}
	if (!isSampleFormat(sampleFormat)) {
		throw new UnsupportedFormatError(`unsupported sample format: ${sampleFormat}`)
	}
	const allowed = BIT_DEPTHS[sampleFormat]
	if (!allowed.includes(bitDepth)) {
		throw new InvalidFormatError(
			`bit depth ${bitDepth} is invalid for ${sampleFormat}. Allowed: ${allowed.join(', ')}`
		)
	}

	return Object.freeze({ channels, sampleRate, bitDepth, sampleFormat })
}

/**
 * Copy a format with some fields replaced
 */
export function withFormat(format: AudioFormat, changes: Partial<FormatOptions>): AudioFormat {
	return createFormat({ ...format, ...changes })
}

/**
 * Field-wise equality
 */
export function formatsEqual(a: AudioFormat, b: AudioFormat): boolean {
	return (
		a.channels === b.channels &&
		a.sampleRate === b.sampleRate &&
		a.bitDepth === b.bitDepth &&
		a.sampleFormat === b.sampleFormat
	)
}

export function bytesPerSample(format: AudioFormat): number {
	return format.bitDepth / 8
}

/**
 * Bytes per sample frame (all channels)
 */
export function blockAlign(format: AudioFormat): number {
	return format.channels * bytesPerSample(format)
}

export function byteRate(format: AudioFormat): number {
	return format.sampleRate * blockAlign(format)
}

/**
 * Smallest and largest integer a PCM sample of this depth can hold
 */
export function pcmRange(bitDepth: number): { min: number; max: number } {
	const half = 2 ** (bitDepth - 1)
	return { min: -half, max: half - 1 }
}

export function describeFormat(format: AudioFormat): string {
	const layout = format.channels === 1 ? 'mono' : format.channels === 2 ? 'stereo' : `${format.channels}ch`
	return `${format.sampleRate} Hz, ${layout}, ${format.bitDepth}-bit ${format.sampleFormat}`
}

/** Stereo 44.1 kHz 16-bit PCM */
export const CD_QUALITY = createFormat({ channels: 2, sampleRate: 44100, bitDepth: 16 })
/** Stereo 96 kHz 24-bit PCM */
export const DVD_QUALITY = createFormat({ channels: 2, sampleRate: 96000, bitDepth: 24 })
/** Mono 16 kHz 16-bit PCM */
export const VOICE = createFormat({ channels: 1, sampleRate: 16000, bitDepth: 16 })

/**
 * Sample buffer helpers
 */

import { BufferConversionError, InvalidParameterError, PcmkitError } from './errors'
import { formatsEqual, pcmRange } from './format'
import type { AudioFormat, SampleBuffer } from './types'

/**
 * Build a buffer from interleaved samples, rounding and clamping to the format's range
 */
export function createSampleBuffer(
	samples: ArrayLike<number>,
	format: AudioFormat
): SampleBuffer {
	if (samples.length % format.channels !== 0) {
		throw new InvalidParameterError(
			`sample count ${samples.length} is not a multiple of ${format.channels} channels`
		)
	}

	if (format.sampleFormat === 'float') {
		const out = new Float64Array(samples.length)
		for (let i = 0; i < samples.length; i++) {
			out[i] = clamp(samples[i] ?? 0, -1, 1)
		}
		return { format, samples: out }
	}

	const { min, max } = pcmRange(format.bitDepth)
	const out = new Int32Array(samples.length)
	for (let i = 0; i < samples.length; i++) {
		out[i] = clamp(Math.round(samples[i] ?? 0), min, max)
	}
	return { format, samples: out }
}

function clamp(value: number, min: number, max: number): number {
	if (Number.isNaN(value)) return 0
	return value < min ? min : value > max ? max : value
}

export function sampleFrameCount(buffer: SampleBuffer): number {
	return buffer.samples.length / buffer.format.channels
}

export function isSampleBuffer(value: unknown): value is SampleBuffer {
	if (typeof value !== 'object' || value === null) return false
	if (!('format' in value) || !('samples' in value)) return false
	const { format, samples } = value
	return (
		typeof format === 'object' &&
		format !== null &&
		'channels' in format &&
		typeof format.channels === 'number' &&
		(samples instanceof Int32Array || samples instanceof Float64Array)
	)
}

/**
 * Join buffers sharing one format
 */
export function concatSampleBuffers(buffers: readonly SampleBuffer[]): SampleBuffer {
	const first = buffers[0]
	if (!first) throw new InvalidParameterError('cannot concatenate zero buffers')

	let total = 0
	for (const buffer of buffers) {
		if (!formatsEqual(buffer.format, first.format)) {
			throw new InvalidParameterError('cannot concatenate buffers with different formats')
		}
		total += buffer.samples.length
	}

	const out = first.format.sampleFormat === 'float' ? new Float64Array(total) : new Int32Array(total)
	let offset = 0
	for (const buffer of buffers) {
		out.set(buffer.samples, offset)
		offset += buffer.samples.length
	}
	return { format: first.format, samples: out }
}

/**
 * Sample frames [start, end) of a buffer
 */
export function sliceSampleBuffer(buffer: SampleBuffer, start: number, end?: number): SampleBuffer {
	const channels = buffer.format.channels
	const frames = sampleFrameCount(buffer)
	const from = Math.max(0, Math.min(frames, start))
	const to = Math.max(from, Math.min(frames, end ?? frames))
	return { format: buffer.format, samples: buffer.samples.slice(from * channels, to * channels) }
}

/**
 * Re-quantise and remap channels
 */
export function convertSampleBuffer(buffer: SampleBuffer, target: AudioFormat): SampleBuffer {
	if (formatsEqual(buffer.format, target)) return buffer

	try {
		const normalized = toNormalized(buffer)
		const remapped = remapChannels(normalized, buffer.format.channels, target.channels)
		return fromNormalized(remapped, target)
	} catch (error) {
		if (error instanceof PcmkitError) throw error
		throw new BufferConversionError('sample buffer conversion failed', error)
	}
}

function toNormalized(buffer: SampleBuffer): Float64Array {
	const { format, samples } = buffer
	const out = new Float64Array(samples.length)
	if (format.sampleFormat === 'float') {
		out.set(samples)
		return out
	}
	const scale = 2 ** (format.bitDepth - 1)
	for (let i = 0; i < samples.length; i++) {
		out[i] = (samples[i] ?? 0) / scale
	}
	return out
}

function fromNormalized(values: Float64Array, format: AudioFormat): SampleBuffer {
	if (format.sampleFormat === 'float') return createSampleBuffer(values, format)
	const scale = 2 ** (format.bitDepth - 1)
	const scaled = new Float64Array(values.length)
	for (let i = 0; i < values.length; i++) {
		scaled[i] = (values[i] ?? 0) * scale
	}
	return createSampleBuffer(scaled, format)
}

function remapChannels(values: Float64Array, from: number, to: number): Float64Array {
	if (from === to) return values
	const frames = values.length / from
	const out = new Float64Array(frames * to)

	for (let frame = 0; frame < frames; frame++) {
		const input = values.subarray(frame * from, (frame + 1) * from)
		const output = out.subarray(frame * to, (frame + 1) * to)
		if (to === 1) {
			// Downmix by averaging
			output[0] = sum(input) / from
		} else if (from < to) {
			// Upmix by repeating channels in order
			for (let ch = 0; ch < to; ch++) output[ch] = input[ch % from]!
		} else if (to === 2) {
			downmixToStereo(input, output)
		} else {
			foldExtraChannels(input, output)
		}
	}
	return out
}

function sum(values: Float64Array): number {
	let total = 0
	for (const value of values) total += value
	return total
}

function clampUnit(value: number): number {
	return Math.max(-1, Math.min(1, value))
}

/**
 * L, R, C, LFE, Ls, Rs order; centre and surrounds at -3 dB, LFE and anything past 6 channels at -6 dB
 */
function downmixToStereo(input: Float64Array, output: Float64Array): void {
	const left = input[0]!
	const right = input[1]!
	const centre = (input[2] ?? 0) * 0.707
	const lfe = (input[3] ?? 0) * 0.5
	const extras = sum(input.subarray(6)) * 0.5
	output[0] = clampUnit(left + centre + lfe + (input[4] ?? 0) * 0.707 + extras)
	output[1] = clampUnit(right + centre + lfe + (input[5] ?? 0) * 0.707 + extras)
}

function foldExtraChannels(input: Float64Array, output: Float64Array): void {
	const extra = sum(input.subarray(output.length)) / output.length
	for (let ch = 0; ch < output.length; ch++) output[ch] = clampUnit(input[ch]! + extra)
}

/**
 * FLAC (Free Lossless Audio Codec) encoder
 * Pure TypeScript implementation of FLAC encoding
 */

import {
	type AudioFormat,
	InvalidParameterError,
	type SampleBuffer,
	UnsupportedFormatError,
	sampleFrameCount,
} from '@pcmkit/core'
import { BitWriter } from './bitstream'
import { crc16 } from './crc'
import { MAX_BLOCK_SIZE, writeFrameHeader } from './header'
import {
	ContentChecksum,
	STREAMINFO_LENGTH,
	buildStreamInfo,
	emptyEncodeStats,
	mergeEncodeStats,
	metadataBlockHeader,
} from './streaminfo'
import { selectSubframeEncoding, writeSubframe } from './subframe'
import { FLAC_MARKER, FlacBlockType, type EncodeStats, type FlacStreamInfo, type FlacWriteOptions } from './types'

export const DEFAULT_BLOCK_SIZE = 4096
export const MAX_CHANNELS = 8
export const MAX_BITS_PER_SAMPLE = 32

/**
 * Reject formats the encoder cannot represent
 */
export function validateEncodeFormat(format: AudioFormat): void {
	if (format.sampleFormat !== 'pcm') {
		throw new UnsupportedFormatError('FLAC encoding requires integer PCM samples')
	}
	if (format.channels < 1 || format.channels > MAX_CHANNELS) {
		throw new UnsupportedFormatError(`FLAC supports 1-${MAX_CHANNELS} channels, got ${format.channels}`)
	}
	if (format.bitDepth > MAX_BITS_PER_SAMPLE) {
		throw new UnsupportedFormatError(`FLAC encoding supports up to ${MAX_BITS_PER_SAMPLE}-bit samples`)
	}
}

/**
 * Positive integer block size, clamped to the frame header's limit
 */
export function normalizeBlockSize(blockSize: number = DEFAULT_BLOCK_SIZE): number {
	if (!Number.isInteger(blockSize) || blockSize <= 0) {
		throw new InvalidParameterError(`block size must be a positive integer: ${blockSize}`)
	}
	return Math.min(blockSize, MAX_BLOCK_SIZE)
}

/**
 * Split `count` interleaved sample frames starting at `start` into per-channel arrays
 */
export function deinterleave(
	samples: ArrayLike<number>,
	channels: number,
	start = 0,
	count = samples.length / channels - start
): Float64Array[] {
	const out: Float64Array[] = []
	for (let ch = 0; ch < channels; ch++) out.push(new Float64Array(count))
	for (let i = 0; i < count; i++) {
		const base = (start + i) * channels
		for (let ch = 0; ch < channels; ch++) {
			const channel = out[ch]
			if (channel) channel[i] = samples[base + ch] ?? 0
		}
	}
	return out
}

/**
 * Encode one frame of independent channels
 */
export function encodeFrame(channels: Float64Array[], bitsPerSample: number, frameNumber: number): Uint8Array {
	const blockSize = channels[0]?.length ?? 0
	const writer = new BitWriter()

	writeFrameHeader(writer, { blockSize, channelAssignment: channels.length - 1, frameNumber })

	for (const samples of channels) {
		const selection = selectSubframeEncoding(samples, bitsPerSample)
		writeSubframe(writer, samples, bitsPerSample, selection.encoding)
	}

	writer.alignToByte()
	writer.writeBits(crc16(writer.getBytes()), 16)
	return writer.getBytes()
}

/**
 * Frames for a run of interleaved samples
 */
export interface EncodedFrames {
	frames: Uint8Array[]
	stats: EncodeStats
	nextFrameNumber: number
}

export function encodeFrames(
	samples: ArrayLike<number>,
	format: AudioFormat,
	blockSize: number,
	firstFrameNumber = 0,
	stats: EncodeStats = emptyEncodeStats()
): EncodedFrames {
	const totalFrames = samples.length / format.channels
	const frames: Uint8Array[] = []
	let frameNumber = firstFrameNumber
	let current = stats

	for (let start = 0; start < totalFrames; start += blockSize) {
		const count = Math.min(blockSize, totalFrames - start)
		const frame = encodeFrame(deinterleave(samples, format.channels, start, count), format.bitDepth, frameNumber)
		frames.push(frame)
		current = mergeEncodeStats(current, count, frame.length)
		frameNumber++
	}
	return { frames, stats: current, nextFrameNumber: frameNumber }
}

/**
 * STREAMINFO for a finished encode
 */
export function finalStreamInfo(
	format: AudioFormat,
	stats: EncodeStats,
	totalSamples: number,
	md5: Uint8Array
): FlacStreamInfo {
	return {
		minBlockSize: stats.minBlockSize,
		maxBlockSize: stats.maxBlockSize,
		minFrameSize: stats.minFrameSize,
		maxFrameSize: stats.maxFrameSize,
		sampleRate: format.sampleRate,
		channels: format.channels,
		bitsPerSample: format.bitDepth,
		totalSamples,
		md5,
	}
}

/**
 * Encode a whole buffer: marker, STREAMINFO, then frames
 */
export function encodeFlac(buffer: SampleBuffer, options: FlacWriteOptions = {}): Uint8Array {
	const { format, samples } = buffer
	validateEncodeFormat(format)
	const blockSize = normalizeBlockSize(options.blockSize)

	const checksum = new ContentChecksum(format.bitDepth)
	checksum.update(samples)
	const { frames, stats } = encodeFrames(samples, format, blockSize)
	const streamInfo = buildStreamInfo(finalStreamInfo(format, stats, sampleFrameCount(buffer), checksum.digest()))

	return concatArrays([
		FLAC_MARKER,
		metadataBlockHeader(FlacBlockType.STREAMINFO, STREAMINFO_LENGTH, true),
		streamInfo,
		...frames,
	])
}

export function concatArrays(arrays: Uint8Array[]): Uint8Array {
	const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0)
	const result = new Uint8Array(totalLength)
	let offset = 0
	for (const arr of arrays) {
		result.set(arr, offset)
		offset += arr.length
	}
	return result
}

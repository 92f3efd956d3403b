/**
 * FLAC (Free Lossless Audio Codec) decoder
 * Pure TypeScript implementation of FLAC decoding
 */

import {
	type AudioFormat,
	type ByteSource,
	InvalidFormatError,
	type SampleBuffer,
	UnsupportedFormatError,
	createFormat,
	isFlacHeader,
} from '@pcmkit/core'
import { BitReader, ByteReader } from './bitstream'
import { restoreChannels, subframeSampleSizes } from './channels'
import { crc16, crc8 } from './crc'
import { readFrameHeader } from './header'
import { parseStreamInfo, readMetadataBlockHeader, toHex } from './streaminfo'
import { decodeSubframe } from './subframe'
import {
	FLAC_MARKER,
	FlacBlockType,
	type FlacFrame,
	type FlacMetadata,
	type FlacReadOptions,
	type FlacStreamInfo,
} from './types'

const PCM_BIT_DEPTHS = [8, 16, 24, 32]

/**
 * Check if data is FLAC
 */
export function isFlac(data: Uint8Array): boolean {
	return isFlacHeader(data)
}

/**
 * Read the marker and metadata blocks, leaving the reader at the first frame
 */
export function readMetadata(reader: ByteReader): FlacStreamInfo {
	const marker = reader.readBytes(FLAC_MARKER.length, 'FLAC marker')
	if (!isFlac(marker)) {
		throw new InvalidFormatError('missing fLaC stream marker')
	}

	let streamInfo: FlacStreamInfo | undefined
	for (;;) {
		const block = readMetadataBlockHeader(reader)
		const body = reader.readBytes(block.length, 'FLAC metadata block')
		if (block.type === FlacBlockType.STREAMINFO) {
			streamInfo = parseStreamInfo(body)
		}
		if (block.isLast) break
	}

	if (!streamInfo) {
		throw new InvalidFormatError('FLAC stream has no STREAMINFO block')
	}
	return streamInfo
}

/**
 * Sample format described by STREAMINFO
 */
export function streamInfoFormat(info: FlacStreamInfo): AudioFormat {
	if (!PCM_BIT_DEPTHS.includes(info.bitsPerSample)) {
		throw new UnsupportedFormatError(`unsupported FLAC bit depth: ${info.bitsPerSample}`)
	}
	return createFormat({
		channels: info.channels,
		sampleRate: info.sampleRate,
		bitDepth: info.bitsPerSample,
	})
}

export function flacMetadata(info: FlacStreamInfo): FlacMetadata {
	const format = streamInfoFormat(info)
	return {
		format,
		sampleFrameCount: info.totalSamples,
		duration: info.totalSamples / info.sampleRate,
		minBlockSize: info.minBlockSize,
		maxBlockSize: info.maxBlockSize,
		minFrameSize: info.minFrameSize,
		maxFrameSize: info.maxFrameSize,
		md5: toHex(info.md5),
		streamInfo: info,
	}
}

/**
 * Decode one frame at the reader's position
 */
export function decodeFrame(
	reader: ByteReader,
	streamInfo: FlacStreamInfo,
	options: FlacReadOptions = {}
): FlacFrame {
	const verify = options.verifyCrc === true
	if (verify) reader.beginCapture()

	try {
		const bits = new BitReader(reader)
		const header = readFrameHeader(bits, streamInfo)

		if (verify) {
			const headerBytes = reader.captured()
			if (crc8(headerBytes.subarray(0, headerBytes.length - 1)) !== header.crc8) {
				throw new InvalidFormatError(`FLAC frame ${header.frameNumber} header CRC-8 mismatch`)
			}
		}

		const sizes = subframeSampleSizes(header.channelAssignment, header.channels, header.bitsPerSample)
		const decoded = sizes.map((size) => decodeSubframe(bits, header.blockSize, size))
		bits.alignToByte()

		const frameBytes = verify ? reader.captured() : undefined
		const crc = bits.readBits(16)
		if (frameBytes && crc16(frameBytes) !== crc) {
			throw new InvalidFormatError(`FLAC frame ${header.frameNumber} CRC-16 mismatch`)
		}

		return { header, channels: restoreChannels(header.channelAssignment, decoded) }
	} finally {
		if (verify) reader.endCapture()
	}
}

/**
 * Frames in order until end of input or until the STREAMINFO total is reached.
 * A frame straddling the total is cut short.
 */
export function* decodeFrames(
	reader: ByteReader,
	streamInfo: FlacStreamInfo,
	options: FlacReadOptions = {}
): Generator<FlacFrame, void, undefined> {
	const total = streamInfo.totalSamples
	let decoded = 0
	let expectedFrame = 0

	while (!(total > 0 && decoded >= total) && !reader.atEnd()) {
		const frame = decodeFrame(reader, streamInfo, options)
		if (frame.header.frameNumber !== expectedFrame) {
			throw new InvalidFormatError(
				`expected FLAC frame ${expectedFrame}, found ${frame.header.frameNumber}`
			)
		}
		expectedFrame++

		let { channels } = frame
		const length = channels[0]?.length ?? 0
		if (total > 0 && decoded + length > total) {
			const keep = total - decoded
			channels = channels.map((samples) => samples.subarray(0, keep))
		}
		decoded += channels[0]?.length ?? 0
		yield { header: frame.header, channels }
	}

	if (total > 0 && decoded < total) {
		throw new InvalidFormatError(
			`FLAC stream is shorter than STREAMINFO total (${decoded} of ${total} sample frames)`
		)
	}
}

/**
 * Interleave per-channel samples into an Int32Array
 */
export function interleave(channels: Float64Array[]): Int32Array {
	const count = channels.length
	const length = channels[0]?.length ?? 0
	const out = new Int32Array(length * count)
	for (let ch = 0; ch < count; ch++) {
		const samples = channels[ch]
		if (!samples) continue
		for (let i = 0; i < length; i++) out[i * count + ch] = samples[i]!
	}
	return out
}

/**
 * Decoded FLAC result
 */
export interface FlacDecodeResult {
	streamInfo: FlacStreamInfo
	buffer: SampleBuffer
}

/**
 * Decode a whole FLAC stream
 */
export function decodeFlac(input: Uint8Array | ByteSource, options: FlacReadOptions = {}): FlacDecodeResult {
	const reader = input instanceof Uint8Array ? ByteReader.fromBytes(input) : new ByteReader(input)
	const streamInfo = readMetadata(reader)
	const format = streamInfoFormat(streamInfo)

	const parts: Int32Array[] = []
	let length = 0
	for (const frame of decodeFrames(reader, streamInfo, options)) {
		const samples = interleave(frame.channels)
		parts.push(samples)
		length += samples.length
	}

	const samples = new Int32Array(length)
	let offset = 0
	for (const part of parts) {
		samples.set(part, offset)
		offset += part.length
	}
	return { streamInfo, buffer: { format, samples } }
}

/**
 * FLAC frame header codec
 */

import { InvalidFormatError, UnsupportedFormatError } from '@pcmkit/core'
import type { BitReader, BitWriter } from './bitstream'
import { crc8 } from './crc'
import { FlacChannelAssignment, type FlacFrameHeader, type FlacStreamInfo } from './types'

export const FRAME_SYNC = 0x3ffe
export const MAX_BLOCK_SIZE = 65536

/** Largest frame number the 7-byte coding holds */
export const MAX_FRAME_NUMBER = 2 ** 36 - 1

const SAMPLE_RATES = [0, 88200, 176400, 192000, 8000, 16000, 22050, 24000, 32000, 44100, 48000, 96000]

const SAMPLE_SIZES: Record<number, number> = {
	1: 8,
	2: 12,
	4: 16,
	5: 20,
	6: 24,
}

/**
 * Header fields the encoder controls
 */
export interface FrameHeaderFields {
	blockSize: number
	/** Raw 4-bit code: channels-1 for independent channels, 8-10 decorrelated stereo */
	channelAssignment: number
	frameNumber: number
}

/**
 * Block size code for the explicit 8-bit or 16-bit forms
 */
export function blockSizeCode(blockSize: number): 6 | 7 {
	if (blockSize > MAX_BLOCK_SIZE) {
		throw new UnsupportedFormatError(`FLAC block size exceeds ${MAX_BLOCK_SIZE}: ${blockSize}`)
	}
	return blockSize <= 256 ? 6 : 7
}

/**
 * Write a frame header and its CRC-8. The writer must be byte aligned.
 */
export function writeFrameHeader(writer: BitWriter, fields: FrameHeaderFields): void {
	const { blockSize, channelAssignment, frameNumber } = fields
	const code = blockSizeCode(blockSize)
	const start = writer.byteLength

	writer.writeBits(FRAME_SYNC, 14)
	writer.writeBits(0, 1) // reserved
	writer.writeBits(0, 1) // fixed block size
	writer.writeBits(code, 4)
	writer.writeBits(0, 4) // sample rate from STREAMINFO
	writer.writeBits(channelAssignment, 4)
	writer.writeBits(0, 3) // sample size from STREAMINFO
	writer.writeBits(0, 1) // reserved
	writeUtf8Number(writer, frameNumber)
	writer.writeBits(blockSize - 1, code === 6 ? 8 : 16)

	writer.writeBits(crc8(writer.getBytes().subarray(start)), 8)
}

/**
 * Read a frame header through its CRC-8, checked against STREAMINFO
 */
export function readFrameHeader(reader: BitReader, streamInfo: FlacStreamInfo): FlacFrameHeader {
	if (reader.readBits(14) !== FRAME_SYNC) {
		throw new InvalidFormatError('invalid FLAC frame sync code')
	}
	if (reader.readBits(1) !== 0) {
		throw new InvalidFormatError('FLAC frame header reserved bit is set')
	}
	if (reader.readBits(1) !== 0) {
		throw new UnsupportedFormatError('variable block size FLAC streams are not supported')
	}

	const sizeCode = reader.readBits(4)
	const rateCode = reader.readBits(4)
	const channelAssignment = reader.readBits(4)
	const sampleSizeCode = reader.readBits(3)
	if (reader.readBits(1) !== 0) {
		throw new InvalidFormatError('FLAC frame header reserved bit is set')
	}

	const frameNumber = readUtf8Number(reader)
	const blockSize = readBlockSize(reader, sizeCode)
	const sampleRate = readSampleRate(reader, rateCode, streamInfo.sampleRate)
	const bitsPerSample = sampleSizeFromCode(sampleSizeCode, streamInfo.bitsPerSample)
	const channels = channelsFromAssignment(channelAssignment, streamInfo.channels)
	const crc = reader.readBits(8)

	return {
		blockSize,
		sampleRate,
		channelAssignment,
		channels,
		bitsPerSample,
		frameNumber,
		crc8: crc,
	}
}

function readBlockSize(reader: BitReader, code: number): number {
	if (code === 0) throw new InvalidFormatError('reserved FLAC block size code')
	if (code === 1) return 192
	if (code <= 5) return 576 * 2 ** (code - 2)
	if (code === 6) return reader.readBits(8) + 1
	if (code === 7) return reader.readBits(16) + 1
	return 256 * 2 ** (code - 8)
}

function readSampleRate(reader: BitReader, code: number, inherited: number): number {
	if (code === 0) return inherited
	if (code <= 11) return SAMPLE_RATES[code] ?? inherited
	switch (code) {
		case 12:
			return reader.readBits(8) * 1000
		case 13:
			return reader.readBits(16)
		case 14:
			return reader.readBits(16) * 10
		default:
			throw new UnsupportedFormatError(`unsupported FLAC sample rate code: ${code}`)
	}
}

function sampleSizeFromCode(code: number, inherited: number): number {
	if (code === 0) return inherited
	const size = SAMPLE_SIZES[code]
	if (size === undefined) {
		throw new UnsupportedFormatError(`unsupported FLAC sample size code: ${code}`)
	}
	return size
}

function channelsFromAssignment(assignment: number, expected: number): number {
	if (assignment <= 7) {
		const channels = assignment + 1
		if (channels !== expected) {
			throw new InvalidFormatError(
				`FLAC frame has ${channels} channels but STREAMINFO declares ${expected}`
			)
		}
		return channels
	}
	if (assignment <= FlacChannelAssignment.MID_SIDE) {
		if (expected !== 2) {
			throw new InvalidFormatError('FLAC stereo decorrelation requires 2 channels')
		}
		return 2
	}
	throw new InvalidFormatError(`reserved FLAC channel assignment: ${assignment}`)
}

/**
 * UTF-8 style variable length integer, 1 to 7 bytes
 */
export function writeUtf8Number(writer: BitWriter, value: number): void {
	if (!Number.isInteger(value) || value < 0 || value > MAX_FRAME_NUMBER) {
		throw new UnsupportedFormatError(`FLAC frame number out of range: ${value}`)
	}
	if (value < 0x80) {
		writer.writeBits(value, 8)
		return
	}

	const bits = value.toString(2).length
	let count = 2
	// count-byte form holds 6 bits per continuation byte plus 7-count in the lead byte
	while (bits > 6 * (count - 1) + (7 - count)) count++

	const continuationBits = 6 * (count - 1)
	const prefix = (0xff << (8 - count)) & 0xff
	writer.writeBits(prefix | Math.floor(value / 2 ** continuationBits), 8)
	for (let i = count - 2; i >= 0; i--) {
		writer.writeBits(0x80 | (Math.floor(value / 2 ** (6 * i)) % 64), 8)
	}
}

export function readUtf8Number(reader: BitReader): number {
	const first = reader.readBits(8)
	if ((first & 0x80) === 0) return first

	let count = 0
	while (count < 8 && (first & (0x80 >> count)) !== 0) count++
	if (count < 2 || count > 7) {
		throw new InvalidFormatError('invalid FLAC frame number coding')
	}

	let value = first & (0xff >> (count + 1))
	for (let i = 1; i < count; i++) {
		const byte = reader.readBits(8)
		if ((byte & 0xc0) !== 0x80) {
			throw new InvalidFormatError('invalid FLAC frame number continuation byte')
		}
		value = value * 64 + (byte & 0x3f)
	}
	return value
}

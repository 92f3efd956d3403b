/**
 * STREAMINFO block, encode statistics and the PCM content checksum
 */

import { createHash, type Hash } from 'node:crypto'
import { InvalidFormatError, UnsupportedFormatError } from '@pcmkit/core'
import { BitReader, BitWriter, ByteReader } from './bitstream'
import type { EncodeStats, FlacMetadataBlockHeader, FlacStreamInfo } from './types'

export const STREAMINFO_LENGTH = 34
export const METADATA_BLOCK_HEADER_LENGTH = 4
export const MAX_TOTAL_SAMPLES = 2 ** 36 - 1

export function metadataBlockHeader(type: number, length: number, isLast: boolean): Uint8Array {
	const writer = new BitWriter()
	writer.writeBits(isLast ? 1 : 0, 1)
	writer.writeBits(type, 7)
	writer.writeBits(length, 24)
	return writer.getBytes()
}

export function readMetadataBlockHeader(reader: ByteReader): FlacMetadataBlockHeader {
	const bytes = reader.readBytes(METADATA_BLOCK_HEADER_LENGTH, 'FLAC metadata block header')
	const first = bytes[0] ?? 0
	return {
		isLast: (first & 0x80) !== 0,
		type: first & 0x7f,
		length: (bytes[1] ?? 0) * 0x10000 + (bytes[2] ?? 0) * 0x100 + (bytes[3] ?? 0),
	}
}

/**
 * Zero-filled STREAMINFO body
 */
export function streamInfoPlaceholder(): Uint8Array {
	return new Uint8Array(STREAMINFO_LENGTH)
}

/**
 * Pack a 34-byte STREAMINFO body
 */
export function buildStreamInfo(info: FlacStreamInfo): Uint8Array {
	if (info.totalSamples > MAX_TOTAL_SAMPLES) {
		throw new UnsupportedFormatError(`FLAC total sample count exceeds 36 bits: ${info.totalSamples}`)
	}
	if (info.md5.length !== 16) {
		throw new RangeError('STREAMINFO checksum must be 16 bytes')
	}

	const writer = new BitWriter()
	writer.writeBits(info.minBlockSize, 16)
	writer.writeBits(info.maxBlockSize, 16)
	writer.writeBits(info.minFrameSize, 24)
	writer.writeBits(info.maxFrameSize, 24)
	writer.writeBits(info.sampleRate, 20)
	writer.writeBits(info.channels - 1, 3)
	writer.writeBits(info.bitsPerSample - 1, 5)
	writer.writeBits(info.totalSamples, 36)
	writer.writeBytes(info.md5)
	return writer.getBytes()
}

export function parseStreamInfo(body: Uint8Array): FlacStreamInfo {
	if (body.length !== STREAMINFO_LENGTH) {
		throw new InvalidFormatError(`FLAC STREAMINFO must be ${STREAMINFO_LENGTH} bytes, got ${body.length}`)
	}
	const reader = new BitReader(ByteReader.fromBytes(body))
	return {
		minBlockSize: reader.readBits(16),
		maxBlockSize: reader.readBits(16),
		minFrameSize: reader.readBits(24),
		maxFrameSize: reader.readBits(24),
		sampleRate: reader.readBits(20),
		channels: reader.readBits(3) + 1,
		bitsPerSample: reader.readBits(5) + 1,
		totalSamples: reader.readBits(36),
		md5: body.slice(18),
	}
}

export function emptyEncodeStats(): EncodeStats {
	return { frames: 0, minBlockSize: 0, maxBlockSize: 0, minFrameSize: 0, maxFrameSize: 0 }
}

/**
 * Fold one encoded frame into the running bounds
 */
export function mergeEncodeStats(stats: EncodeStats, blockSize: number, frameSize: number): EncodeStats {
	if (stats.frames === 0) {
		return {
			frames: 1,
			minBlockSize: blockSize,
			maxBlockSize: blockSize,
			minFrameSize: frameSize,
			maxFrameSize: frameSize,
		}
	}
	return {
		frames: stats.frames + 1,
		minBlockSize: Math.min(stats.minBlockSize, blockSize),
		maxBlockSize: Math.max(stats.maxBlockSize, blockSize),
		minFrameSize: Math.min(stats.minFrameSize, frameSize),
		maxFrameSize: Math.max(stats.maxFrameSize, frameSize),
	}
}

/**
 * Little-endian signed PCM bytes hashed by the STREAMINFO checksum
 */
export function pcmBytes(samples: ArrayLike<number>, bitDepth: number): Uint8Array {
	const width = bitDepth / 8
	const out = new Uint8Array(samples.length * width)
	const view = new DataView(out.buffer)

	for (let i = 0; i < samples.length; i++) {
		const value = samples[i] ?? 0
		const offset = i * width
		switch (bitDepth) {
			case 8:
				view.setInt8(offset, value)
				break
			case 16:
				view.setInt16(offset, value, true)
				break
			case 24:
				out[offset] = value & 0xff
				out[offset + 1] = (value >> 8) & 0xff
				out[offset + 2] = (value >> 16) & 0xff
				break
			case 32:
				view.setInt32(offset, value, true)
				break
			default:
				throw new UnsupportedFormatError(`no PCM byte layout for ${bitDepth}-bit samples`)
		}
	}
	return out
}

/**
 * Running MD5 over PCM bytes
 */
export class ContentChecksum {
	private readonly hash: Hash = createHash('md5')

	constructor(private readonly bitDepth: number) {}

	update(samples: ArrayLike<number>): void {
		this.hash.update(pcmBytes(samples, this.bitDepth))
	}

	digest(): Uint8Array {
		return new Uint8Array(this.hash.digest())
	}
}

export function toHex(bytes: Uint8Array): string {
	return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join('')
}

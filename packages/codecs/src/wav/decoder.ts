/**
 * WAV audio decoder
 * Decodes RIFF WAVE audio files
 */

import {
	type AudioFormat,
	type AudioInput,
	type ByteSource,
	DEFAULT_CHUNK_SIZE,
	InvalidFormatError,
	InvalidParameterError,
	type SampleBuffer,
	type Seekable,
	type StreamReadOptions,
	StreamError,
	UnsupportedFormatError,
	blockAlign,
	byteRate,
	bytesPerSample,
	createFormat,
	isSeekable,
	isWavHeader,
	openInput,
} from '@pcmkit/core'
import {
	CHUNK_HEADER_LENGTH,
	DATA_ID,
	FACT_ID,
	FMT_EXTENSIBLE_LENGTH,
	FMT_ID,
	FMT_LENGTH,
	WavFormat,
	type WavChunkDirectory,
	type WavFmt,
	type WavMetadata,
} from './types'

/**
 * Check if data is a WAV file
 */
export function isWav(data: Uint8Array): boolean {
	return isWavHeader(data)
}

function view(data: Uint8Array): DataView {
	return new DataView(data.buffer, data.byteOffset, data.byteLength)
}

function fourCC(data: Uint8Array, offset: number): string {
	return String.fromCharCode(...data.subarray(offset, offset + 4))
}

function readExact(source: ByteSource, length: number, what: string): Uint8Array {
	const bytes = source.read(length)
	if (bytes.length !== length) throw new InvalidFormatError(`truncated WAV ${what}`)
	return bytes
}

function sourceSize(source: ByteSource): number | undefined {
	return 'size' in source && typeof source.size === 'number' ? source.size : undefined
}

function seekable(source: ByteSource): ByteSource & Seekable {
	if (!isSeekable(source)) {
		throw new StreamError('WAV reading requires a seekable input')
	}
	return source
}

/**
 * Parse a `fmt ` chunk body, resolving WAVE_FORMAT_EXTENSIBLE to its sub-format
 */
export function parseFmtChunk(body: Uint8Array): WavFmt {
	if (body.length < FMT_LENGTH) {
		throw new InvalidFormatError('WAV fmt chunk is too small')
	}

	const data = view(body)
	const fmt: WavFmt = {
		formatTag: data.getUint16(0, true),
		audioFormat: data.getUint16(0, true),
		numChannels: data.getUint16(2, true),
		sampleRate: data.getUint32(4, true),
		byteRate: data.getUint32(8, true),
		blockAlign: data.getUint16(12, true),
		bitsPerSample: data.getUint16(14, true),
	}

	if (fmt.formatTag === WavFormat.EXTENSIBLE) {
		if (body.length < FMT_EXTENSIBLE_LENGTH) {
			throw new InvalidFormatError('WAV extensible fmt chunk is too small')
		}
		const extensionSize = data.getUint16(16, true)
		if (extensionSize < 22 || body.length < 18 + extensionSize) {
			throw new InvalidFormatError(`invalid WAV extensible fmt size: ${extensionSize}`)
		}
		const validBits = data.getUint16(18, true)
		if (validBits > 0) fmt.bitsPerSample = validBits
		fmt.channelMask = data.getUint32(20, true)
		// The sub-format GUID starts with the plain format code
		fmt.audioFormat = data.getUint16(24, true)
	}

	return fmt
}

/**
 * Audio format described by a `fmt ` chunk
 */
export function fmtToFormat(fmt: WavFmt): AudioFormat {
	let sampleFormat: 'pcm' | 'float'
	switch (fmt.audioFormat) {
		case WavFormat.PCM:
			sampleFormat = 'pcm'
			break
		case WavFormat.IEEE_FLOAT:
			sampleFormat = 'float'
			break
		default:
			throw new UnsupportedFormatError(`unsupported WAV format code: ${fmt.audioFormat}`)
	}

	const format = createFormat({
		channels: fmt.numChannels,
		sampleRate: fmt.sampleRate,
		bitDepth: fmt.bitsPerSample,
		sampleFormat,
	})
	if (fmt.blockAlign !== blockAlign(format) || fmt.byteRate !== byteRate(format)) {
		throw new InvalidFormatError('WAV fmt chunk has inconsistent byteRate/blockAlign')
	}
	return format
}

/**
 * Walk the chunk list from the source's position, locating `fmt `, `data` and `fact`.
 * Unknown chunks are skipped; odd-sized chunks carry a pad byte.
 */
export function readChunkDirectory(source: ByteSource & Seekable): WavChunkDirectory {
	const header = readExact(source, 12, 'RIFF/WAVE header')
	if (!isWav(header)) {
		throw new InvalidFormatError('invalid WAV header')
	}

	let fmt: WavFmt | undefined
	let dataOffset: number | undefined
	let dataSize = 0
	let factSampleLength: number | undefined

	for (;;) {
		const chunkHeader = source.read(CHUNK_HEADER_LENGTH)
		if (chunkHeader.length === 0) break
		if (chunkHeader.length < CHUNK_HEADER_LENGTH) {
			throw new InvalidFormatError('truncated WAV chunk header')
		}

		const id = fourCC(chunkHeader, 0)
		const size = view(chunkHeader).getUint32(4, true)

		switch (id) {
			case FMT_ID:
				fmt = parseFmtChunk(readExact(source, size, 'fmt chunk'))
				break
			case DATA_ID:
				dataOffset = source.position
				dataSize = size
				source.seek(source.position + size)
				break
			case FACT_ID: {
				const body = readExact(source, size, 'fact chunk')
				if (body.length >= 4) factSampleLength = view(body).getUint32(0, true)
				break
			}
			default:
				source.seek(source.position + size)
		}

		if (size % 2 === 1 && source.read(1).length !== 1) {
			throw new InvalidFormatError('missing padding byte after odd-sized WAV chunk')
		}
	}

	if (!fmt) throw new InvalidFormatError('WAV fmt chunk missing')
	if (dataOffset === undefined) throw new InvalidFormatError('WAV data chunk missing')

	const format = fmtToFormat(fmt)
	if (dataSize % blockAlign(format) !== 0) {
		throw new InvalidFormatError('WAV data chunk size is not aligned to frame size')
	}
	const size = sourceSize(source)
	if (size !== undefined && dataOffset + dataSize > size) {
		throw new InvalidFormatError('WAV data chunk exceeds file size')
	}

	return { fmt, format, dataOffset, dataSize, factSampleLength }
}

export function wavMetadata(directory: WavChunkDirectory): WavMetadata {
	const { fmt, format, dataOffset, dataSize, factSampleLength } = directory
	const sampleFrameCount = dataSize / blockAlign(format)
	return {
		format,
		sampleFrameCount,
		duration: sampleFrameCount / format.sampleRate,
		extensible: fmt.formatTag === WavFormat.EXTENSIBLE,
		channelMask: fmt.channelMask,
		factSampleLength,
		dataOffset,
		dataSize,
	}
}

/**
 * Decode little-endian sample bytes. 8-bit PCM is unsigned around 128.
 */
export function decodeSamples(data: Uint8Array, format: AudioFormat): SampleBuffer {
	const bytes = view(data)
	const width = bytesPerSample(format)
	const count = Math.floor(data.length / width)

	if (format.sampleFormat === 'float') {
		const out = new Float64Array(count)
		for (let i = 0; i < count; i++) {
			out[i] = width === 4 ? bytes.getFloat32(i * 4, true) : bytes.getFloat64(i * 8, true)
		}
		return { format, samples: out }
	}

	const out = new Int32Array(count)
	switch (format.bitDepth) {
		case 8:
			for (let i = 0; i < count; i++) out[i] = bytes.getUint8(i) - 128
			break
		case 16:
			for (let i = 0; i < count; i++) out[i] = bytes.getInt16(i * 2, true)
			break
		case 24:
			for (let i = 0; i < count; i++) {
				const offset = i * 3
				const u = bytes.getUint8(offset) | (bytes.getUint8(offset + 1) << 8) | (bytes.getUint8(offset + 2) << 16)
				out[i] = u > 0x7fffff ? u - 0x1000000 : u
			}
			break
		case 32:
			for (let i = 0; i < count; i++) out[i] = bytes.getInt32(i * 4, true)
			break
		default:
			throw new UnsupportedFormatError(`unsupported WAV bit depth: ${format.bitDepth}`)
	}
	return { format, samples: out }
}

/**
 * Decoded WAV result
 */
export interface WavDecodeResult {
	directory: WavChunkDirectory
	buffer: SampleBuffer
}

/**
 * Decode a whole WAV stream
 */
export function decodeWav(input: Uint8Array | ByteSource): WavDecodeResult {
	const opened = openInput(input)
	const source = seekable(opened.stream)
	const directory = readChunkDirectory(source)
	source.seek(directory.dataOffset)
	const data = readExact(source, directory.dataSize, 'data chunk')
	return { directory, buffer: decodeSamples(data, directory.format) }
}

/**
 * Read WAV metadata without decoding samples
 */
export function readWavMetadata(input: Uint8Array | ByteSource): WavMetadata {
	return wavMetadata(readChunkDirectory(seekable(openInput(input).stream)))
}

/**
 * Data chunk samples in `chunkSize` sample frame buffers
 */
export function* streamReadWav(
	input: AudioInput,
	options: StreamReadOptions = {}
): Generator<SampleBuffer, void, undefined> {
	const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new InvalidParameterError(`chunk size must be a positive integer: ${chunkSize}`)
	}

	const opened = openInput(input)
	try {
		const source = seekable(opened.stream)
		const { format, dataOffset, dataSize } = readChunkDirectory(source)
		const chunkBytes = chunkSize * blockAlign(format)

		source.seek(dataOffset)
		let remaining = dataSize
		while (remaining > 0) {
			const length = Math.min(remaining, chunkBytes)
			yield decodeSamples(readExact(source, length, 'data chunk'), format)
			remaining -= length
		}
	} finally {
		opened.close()
	}
}

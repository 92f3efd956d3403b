/**
 * WAV audio encoder
 * Encodes audio to RIFF WAVE format through a streaming writer whose
 * size fields are patched once the data is complete
 */

import {
	type AudioFormat,
	type AudioOutput,
	type ByteSink,
	type ChunkWriter,
	InvalidParameterError,
	MemoryStream,
	type SampleBuffer,
	type Seekable,
	StreamError,
	UnsupportedFormatError,
	blockAlign,
	byteRate,
	bytesPerSample,
	convertSampleBuffer,
	ensureSeekable,
	formatsEqual,
	isSampleBuffer,
	isSeekable,
	openOutput,
	pcmRange,
} from '@pcmkit/core'
import {
	CHUNK_HEADER_LENGTH,
	DATA_ID,
	FACT_ID,
	FMT_EXTENSIBLE_LENGTH,
	FMT_ID,
	FMT_LENGTH,
	MAX_CHUNK_SIZE,
	RIFF_ID,
	SUBFORMAT_GUID_TAIL,
	WAVE_ID,
	WavFormat,
	type WavMetadata,
} from './types'

/** Default speaker layouts up to 7.1 */
const SPEAKER_MASKS: Record<number, number> = {
	1: 0x4,
	2: 0x3,
	3: 0x7,
	4: 0x33,
	5: 0x37,
	6: 0x3f,
	7: 0x13f,
	8: 0x63f,
}

/**
 * WAVE_FORMAT_EXTENSIBLE is required beyond stereo or 16 bits
 */
export function useExtensibleFormat(format: AudioFormat): boolean {
	return format.channels > 2 || format.bitDepth > 16
}

export function channelMask(channels: number): number {
	return SPEAKER_MASKS[channels] ?? 2 ** Math.min(channels, 32) - 1
}

function ascii(id: string): Uint8Array {
	return Uint8Array.from(id, (char) => char.charCodeAt(0))
}

function u32le(value: number): Uint8Array {
	const bytes = new Uint8Array(4)
	new DataView(bytes.buffer).setUint32(0, value, true)
	return bytes
}

/**
 * `fmt ` chunk body, plain or extensible
 */
export function buildFmtChunk(format: AudioFormat): Uint8Array {
	const extensible = useExtensibleFormat(format)
	const code = format.sampleFormat === 'pcm' ? WavFormat.PCM : WavFormat.IEEE_FLOAT
	const body = new Uint8Array(extensible ? FMT_EXTENSIBLE_LENGTH : FMT_LENGTH)
	const view = new DataView(body.buffer)

	view.setUint16(0, extensible ? WavFormat.EXTENSIBLE : code, true)
	view.setUint16(2, format.channels, true)
	view.setUint32(4, format.sampleRate, true)
	view.setUint32(8, byteRate(format), true)
	view.setUint16(12, blockAlign(format), true)
	view.setUint16(14, format.bitDepth, true)

	if (extensible) {
		view.setUint16(16, 22, true) // extension size
		view.setUint16(18, format.bitDepth, true) // valid bits
		view.setUint32(20, channelMask(format.channels), true)
		// KSDATAFORMAT_SUBTYPE_PCM / _IEEE_FLOAT
		view.setUint32(24, code, true)
		view.setUint16(28, 0x0000, true)
		view.setUint16(30, 0x0010, true)
		body.set(SUBFORMAT_GUID_TAIL, 32)
	}
	return body
}

function clamp(value: number, min: number, max: number): number {
	if (Number.isNaN(value)) return 0
	return value < min ? min : value > max ? max : value
}

/**
 * Little-endian sample bytes. 8-bit PCM is stored unsigned around 128.
 */
export function encodeSamples(samples: ArrayLike<number>, format: AudioFormat): Uint8Array {
	const out = new Uint8Array(samples.length * bytesPerSample(format))
	const view = new DataView(out.buffer)

	if (format.sampleFormat === 'float') {
		for (let i = 0; i < samples.length; i++) {
			const value = clamp(samples[i] ?? 0, -1, 1)
			if (format.bitDepth === 32) view.setFloat32(i * 4, value, true)
			else view.setFloat64(i * 8, value, true)
		}
		return out
	}

	const { min, max } = pcmRange(format.bitDepth)
	for (let i = 0; i < samples.length; i++) {
		const value = clamp(Math.trunc(samples[i] ?? 0), min, max)
		switch (format.bitDepth) {
			case 8:
				view.setUint8(i, value + 128)
				break
			case 16:
				view.setInt16(i * 2, value, true)
				break
			case 24: {
				const u = value < 0 ? value + 0x1000000 : value
				view.setUint8(i * 3, u & 0xff)
				view.setUint8(i * 3 + 1, (u >> 8) & 0xff)
				view.setUint8(i * 3 + 2, (u >> 16) & 0xff)
				break
			}
			case 32:
				view.setInt32(i * 4, value, true)
				break
			default:
				throw new UnsupportedFormatError(`cannot encode ${format.bitDepth}-bit WAV samples`)
		}
	}
	return out
}

/**
 * Incremental WAV writer over a seekable sink
 */
export class WavStreamWriter {
	private dataBytes = 0
	private sampleFrames = 0
	private closed = false

	private constructor(
		private readonly sink: ByteSink & Seekable,
		readonly format: AudioFormat,
		private readonly start: number,
		private readonly factOffset: number | null,
		private readonly dataSizeOffset: number
	) {}

	/**
	 * Write the RIFF header with zeroed sizes
	 */
	static open(sink: ByteSink, format: AudioFormat): WavStreamWriter {
		const target = ensureSeekable(sink, 'WAV stream writing')
		const start = target.position
		const fmt = buildFmtChunk(format)

		target.write(ascii(RIFF_ID))
		target.write(u32le(0))
		target.write(ascii(WAVE_ID))
		target.write(ascii(FMT_ID))
		target.write(u32le(fmt.length))
		target.write(fmt)

		let factOffset: number | null = null
		if (format.sampleFormat !== 'pcm') {
			target.write(ascii(FACT_ID))
			target.write(u32le(4))
			factOffset = target.position
			target.write(u32le(0))
		}

		target.write(ascii(DATA_ID))
		const dataSizeOffset = target.position
		target.write(u32le(0))

		return new WavStreamWriter(target, format, start, factOffset, dataSizeOffset)
	}

	/** Offset of the first sample byte */
	get dataOffset(): number {
		return this.dataSizeOffset + 4
	}

	write(chunk: unknown): void {
		if (this.closed) throw new StreamError('WAV stream writer is closed')
		if (!isSampleBuffer(chunk)) {
			throw new InvalidParameterError('stream chunk must be a SampleBuffer')
		}

		const buffer = formatsEqual(chunk.format, this.format) ? chunk : convertSampleBuffer(chunk, this.format)
		const encoded = encodeSamples(buffer.samples, this.format)
		if (this.dataBytes + encoded.length > MAX_CHUNK_SIZE - CHUNK_HEADER_LENGTH) {
			throw new UnsupportedFormatError('WAV data exceeds the 4 GiB RIFF limit')
		}
		this.sink.write(encoded)
		this.dataBytes += encoded.length
		this.sampleFrames += buffer.samples.length / this.format.channels
	}

	/**
	 * Pad odd data, patch the size fields and leave the cursor at the end
	 */
	close(): WavMetadata {
		if (this.closed) throw new StreamError('WAV stream writer is already closed')
		this.closed = true

		if (this.dataBytes % 2 === 1) this.sink.write(new Uint8Array(1))
		const end = this.sink.position

		this.sink.seek(this.dataSizeOffset)
		this.sink.write(u32le(this.dataBytes))
		if (this.factOffset !== null) {
			this.sink.seek(this.factOffset)
			this.sink.write(u32le(this.sampleFrames))
		}
		this.sink.seek(this.start + 4)
		this.sink.write(u32le(end - this.start - CHUNK_HEADER_LENGTH))
		this.sink.seek(end)

		return {
			format: this.format,
			sampleFrameCount: this.sampleFrames,
			duration: this.sampleFrames / this.format.sampleRate,
			extensible: useExtensibleFormat(this.format),
			channelMask: useExtensibleFormat(this.format) ? channelMask(this.format.channels) : undefined,
			factSampleLength: this.factOffset === null ? undefined : this.sampleFrames,
			dataOffset: this.dataOffset,
			dataSize: this.dataBytes,
		}
	}
}

/**
 * Open a writer on a path or seekable sink, hand it to `body`, then finalise
 */
export function streamWriteWav(
	output: AudioOutput,
	format: AudioFormat,
	body: (write: ChunkWriter) => void
): WavMetadata {
	if (typeof output !== 'string' && !isSeekable(output)) {
		throw new StreamError('WAV stream writing requires a seekable output')
	}

	const opened = openOutput(output)
	try {
		const writer = WavStreamWriter.open(opened.stream, format)
		body((chunk) => writer.write(chunk))
		return writer.close()
	} finally {
		opened.close()
	}
}

/**
 * Encode a whole buffer to WAV bytes
 */
export function encodeWav(buffer: SampleBuffer, format: AudioFormat = buffer.format): Uint8Array {
	const stream = new MemoryStream()
	streamWriteWav(stream, format, (write) => write(buffer))
	return stream.toUint8Array()
}

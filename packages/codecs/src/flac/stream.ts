/**
 * Streaming FLAC encode and decode
 */

import {
	type AudioFormat,
	type AudioInput,
	type AudioOutput,
	type ByteSink,
	type ChunkWriter,
	DEFAULT_CHUNK_SIZE,
	InvalidParameterError,
	type SampleBuffer,
	type Seekable,
	StreamError,
	UnsupportedFormatError,
	convertSampleBuffer,
	ensureSeekable,
	formatsEqual,
	isSampleBuffer,
	isSeekable,
	openInput,
	openOutput,
} from '@pcmkit/core'
import { ByteReader } from './bitstream'
import { decodeFrames, flacMetadata, interleave, readMetadata, streamInfoFormat } from './decoder'
import { encodeFrames, finalStreamInfo, normalizeBlockSize, validateEncodeFormat } from './encoder'
import { MAX_BLOCK_SIZE } from './header'
import {
	ContentChecksum,
	METADATA_BLOCK_HEADER_LENGTH,
	STREAMINFO_LENGTH,
	buildStreamInfo,
	emptyEncodeStats,
	metadataBlockHeader,
	streamInfoPlaceholder,
} from './streaminfo'
import {
	BLOCK_SIZE_STRATEGIES,
	type BlockSizeStrategy,
	FLAC_MARKER,
	FlacBlockType,
	type EncodeStats,
	type FlacMetadata,
	type FlacStreamReadOptions,
	type FlacStreamWriteOptions,
} from './types'

export function isBlockSizeStrategy(value: unknown): value is BlockSizeStrategy {
	return BLOCK_SIZE_STRATEGIES.some((strategy) => strategy === value)
}

/**
 * Validated streaming write settings
 */
export interface StreamWriteSettings {
	blockSize: number
	strategy: BlockSizeStrategy
}

export function normalizeStreamWriteOptions(options: FlacStreamWriteOptions): StreamWriteSettings {
	const strategy: unknown = options.blockSizeStrategy ?? 'per_chunk'
	if (!isBlockSizeStrategy(strategy)) {
		throw new InvalidParameterError(
			`unknown block size strategy: ${String(strategy)}. Expected one of ${BLOCK_SIZE_STRATEGIES.join(', ')}`
		)
	}
	return { blockSize: normalizeBlockSize(options.blockSize), strategy }
}

/**
 * Incremental FLAC writer over a seekable sink.
 * STREAMINFO is written as a placeholder and patched by close().
 */
export class FlacStreamWriter {
	private readonly checksum: ContentChecksum
	private readonly streamInfoOffset: number
	private stats: EncodeStats = emptyEncodeStats()
	private pending: Int32Array = new Int32Array(0)
	private totalSamples = 0
	private nextFrameNumber = 0
	private closed = false

	private constructor(
		private readonly sink: ByteSink & Seekable,
		readonly format: AudioFormat,
		private readonly settings: StreamWriteSettings
	) {
		this.checksum = new ContentChecksum(format.bitDepth)
		this.streamInfoOffset = sink.position + FLAC_MARKER.length + METADATA_BLOCK_HEADER_LENGTH
	}

	/**
	 * Validate everything, then write the marker, block header and placeholder
	 */
	static open(sink: ByteSink, format: AudioFormat, options: FlacStreamWriteOptions = {}): FlacStreamWriter {
		validateEncodeFormat(format)
		const settings = normalizeStreamWriteOptions(options)
		const writer = new FlacStreamWriter(ensureSeekable(sink, 'FLAC stream writing'), format, settings)
		sink.write(FLAC_MARKER)
		sink.write(metadataBlockHeader(FlacBlockType.STREAMINFO, STREAMINFO_LENGTH, true))
		sink.write(streamInfoPlaceholder())
		return writer
	}

	get blockSizeStrategy(): BlockSizeStrategy {
		return this.settings.strategy
	}

	/**
	 * Accept one chunk; frames are emitted as the strategy allows
	 */
	write(chunk: unknown): void {
		if (this.closed) throw new StreamError('FLAC stream writer is closed')
		if (!isSampleBuffer(chunk)) {
			throw new InvalidParameterError('stream chunk must be a SampleBuffer')
		}

		const buffer = formatsEqual(chunk.format, this.format) ? chunk : convertSampleBuffer(chunk, this.format)
		const frames = buffer.samples.length / this.format.channels
		if (this.settings.strategy === 'source_chunk' && frames > MAX_BLOCK_SIZE) {
			throw new UnsupportedFormatError(`FLAC block size exceeds ${MAX_BLOCK_SIZE}: ${frames}`)
		}
		this.checksum.update(buffer.samples)
		this.totalSamples += frames

		if (this.settings.strategy === 'source_chunk') {
			if (frames > 0) this.emit(buffer.samples, frames)
			return
		}

		this.pending = appendSamples(this.pending, buffer.samples)
		const { blockSize } = this.settings
		const ready = Math.floor(this.pending.length / this.format.channels / blockSize) * blockSize
		if (ready > 0) {
			const cut = ready * this.format.channels
			this.emit(this.pending.subarray(0, cut), blockSize)
			this.pending = this.pending.slice(cut)
		}
	}

	/**
	 * Flush the remainder, patch STREAMINFO and leave the cursor at the end
	 */
	close(): FlacMetadata {
		if (this.closed) throw new StreamError('FLAC stream writer is already closed')
		this.closed = true

		if (this.pending.length > 0) {
			const frames = this.pending.length / this.format.channels
			this.emit(this.pending, frames)
			this.pending = new Int32Array(0)
		}

		const info = finalStreamInfo(this.format, this.stats, this.totalSamples, this.checksum.digest())
		const body = buildStreamInfo(info)
		const end = this.sink.position
		this.sink.seek(this.streamInfoOffset)
		this.sink.write(body)
		this.sink.seek(end)
		return flacMetadata(info)
	}

	private emit(samples: ArrayLike<number>, blockSize: number): void {
		const encoded = encodeFrames(samples, this.format, blockSize, this.nextFrameNumber, this.stats)
		for (const frame of encoded.frames) this.sink.write(frame)
		this.stats = encoded.stats
		this.nextFrameNumber = encoded.nextFrameNumber
	}
}

function appendSamples(head: Int32Array, tail: Int32Array | Float64Array): Int32Array {
	const out = new Int32Array(head.length + tail.length)
	out.set(head)
	out.set(tail, head.length)
	return out
}

/**
 * Open a writer on a path or seekable sink, hand it to `body`, then finalise
 */
export function streamWriteFlac(
	output: AudioOutput,
	format: AudioFormat,
	options: FlacStreamWriteOptions,
	body: (write: ChunkWriter) => void
): FlacMetadata {
	validateEncodeFormat(format)
	normalizeStreamWriteOptions(options)
	if (typeof output !== 'string' && !isSeekable(output)) {
		throw new StreamError('FLAC stream writing requires a seekable output')
	}

	const opened = openOutput(output)
	try {
		const writer = FlacStreamWriter.open(opened.stream, format, options)
		body((chunk) => writer.write(chunk))
		return writer.close()
	} finally {
		opened.close()
	}
}

/**
 * Decoded samples re-segmented into `chunkSize` sample frame buffers
 */
export function* streamReadFlac(
	input: AudioInput,
	options: FlacStreamReadOptions = {}
): Generator<SampleBuffer, void, undefined> {
	const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new InvalidParameterError(`chunk size must be a positive integer: ${chunkSize}`)
	}

	const opened = openInput(input)
	try {
		const reader = new ByteReader(opened.stream)
		const streamInfo = readMetadata(reader)
		const format = streamInfoFormat(streamInfo)
		const chunkLength = chunkSize * format.channels
		let pending: Int32Array = new Int32Array(0)

		for (const frame of decodeFrames(reader, streamInfo, options)) {
			pending = appendSamples(pending, interleave(frame.channels))
			let offset = 0
			while (pending.length - offset >= chunkLength) {
				yield { format, samples: pending.slice(offset, offset + chunkLength) }
				offset += chunkLength
			}
			pending = pending.slice(offset)
		}

		if (pending.length > 0) yield { format, samples: pending }
	} finally {
		opened.close()
	}
}

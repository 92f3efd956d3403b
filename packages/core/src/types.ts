import type { ByteSink, ByteSource } from './io'

/**
 * Sample representation
 */
export type SampleFormat = 'pcm' | 'float'

/**
 * Sample layout: channel count, rate and sample type
 */
export interface AudioFormat {
	readonly channels: number
	readonly sampleRate: number
	readonly bitDepth: number
	readonly sampleFormat: SampleFormat
}

/**
 * Interleaved samples (L, R, L, R, ...) tagged with their format.
 * PCM samples are integers in an Int32Array, float samples lie in [-1, 1].
 */
export interface SampleBuffer {
	readonly format: AudioFormat
	readonly samples: Int32Array | Float64Array
}

/**
 * Supported audio containers
 */
export type AudioContainer = 'wav' | 'flac'

/**
 * Where audio is read from: a file path, bytes in memory or a byte source
 */
export type AudioInput = string | Uint8Array | ByteSource

/**
 * Where audio is written to: a file path or a byte sink
 */
export type AudioOutput = string | ByteSink

/**
 * Container-independent metadata
 */
export interface AudioMetadata {
	readonly format: AudioFormat
	/** Sample frames (one sample per channel) */
	readonly sampleFrameCount: number
	/** Seconds */
	readonly duration: number
}

export interface StreamReadOptions {
	/** Sample frames per yielded buffer (default 4096) */
	chunkSize?: number
}

/**
 * Receives one chunk of a streamed write
 */
export type ChunkWriter = (chunk: SampleBuffer) => void

/**
 * Codec interface shared by every container implementation
 */
export interface AudioCodec<
	TMetadata extends AudioMetadata = AudioMetadata,
	TWriteOptions extends object = object,
> {
	readonly name: AudioContainer
	readonly extensions: readonly string[]
	/** Extension or magic bytes match */
	canRead(input: AudioInput): boolean
	read(input: AudioInput, format?: AudioFormat): SampleBuffer
	write(output: AudioOutput, buffer: SampleBuffer, format?: AudioFormat): void
	streamRead(input: AudioInput, options?: StreamReadOptions): Generator<SampleBuffer, void, undefined>
	streamWrite(
		output: AudioOutput,
		format: AudioFormat,
		options: TWriteOptions,
		body: (write: ChunkWriter) => void
	): TMetadata
	metadata(input: AudioInput): TMetadata
}

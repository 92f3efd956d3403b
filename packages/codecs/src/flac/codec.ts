/**
 * FLAC codec class implementation
 * Integrates decoder, encoder and streaming
 */

import {
	type AudioCodec,
	type AudioFormat,
	type AudioInput,
	type AudioOutput,
	type ChunkWriter,
	type SampleBuffer,
	containerFromPath,
	convertSampleBuffer,
	openInput,
	openOutput,
	peekInput,
} from '@pcmkit/core'
import { ByteReader } from './bitstream'
import { decodeFlac, flacMetadata, isFlac, readMetadata } from './decoder'
import { encodeFlac } from './encoder'
import { streamReadFlac, streamWriteFlac } from './stream'
import type { FlacMetadata, FlacReadOptions, FlacStreamReadOptions, FlacStreamWriteOptions, FlacWriteOptions } from './types'

export class FlacCodec implements AudioCodec<FlacMetadata, FlacStreamWriteOptions> {
	readonly name = 'flac'
	readonly extensions = ['.flac']

	constructor(
		private readonly readOptions: FlacReadOptions = {},
		private readonly writeOptions: FlacWriteOptions = {}
	) {}

	canRead(input: AudioInput): boolean {
		if (typeof input === 'string' && containerFromPath(input) === 'flac') return true
		return isFlac(peekInput(input, 4))
	}

	read(input: AudioInput, format?: AudioFormat): SampleBuffer {
		const opened = openInput(input)
		try {
			const { buffer } = decodeFlac(opened.stream, this.readOptions)
			return format ? convertSampleBuffer(buffer, format) : buffer
		} finally {
			opened.close()
		}
	}

	write(output: AudioOutput, buffer: SampleBuffer, format?: AudioFormat): void {
		const bytes = encodeFlac(format ? convertSampleBuffer(buffer, format) : buffer, this.writeOptions)
		const opened = openOutput(output)
		try {
			opened.stream.write(bytes)
		} finally {
			opened.close()
		}
	}

	streamRead(input: AudioInput, options: FlacStreamReadOptions = {}): Generator<SampleBuffer, void, undefined> {
		return streamReadFlac(input, { ...this.readOptions, ...options })
	}

	streamWrite(
		output: AudioOutput,
		format: AudioFormat,
		options: FlacStreamWriteOptions,
		body: (write: ChunkWriter) => void
	): FlacMetadata {
		return streamWriteFlac(output, format, { ...this.writeOptions, ...options }, body)
	}

	metadata(input: AudioInput): FlacMetadata {
		const opened = openInput(input)
		try {
			return flacMetadata(readMetadata(new ByteReader(opened.stream)))
		} finally {
			opened.close()
		}
	}
}

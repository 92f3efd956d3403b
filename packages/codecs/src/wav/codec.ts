/**
 * WAV codec class implementation
 */

import {
	type AudioCodec,
	type AudioFormat,
	type AudioInput,
	type AudioOutput,
	type ChunkWriter,
	type SampleBuffer,
	type StreamReadOptions,
	containerFromPath,
	convertSampleBuffer,
	openInput,
	peekInput,
} from '@pcmkit/core'
import { decodeWav, isWav, readWavMetadata, streamReadWav } from './decoder'
import { streamWriteWav } from './encoder'
import type { WavMetadata } from './types'

export class WavCodec implements AudioCodec<WavMetadata> {
	readonly name = 'wav'
	readonly extensions = ['.wav', '.wave']

	canRead(input: AudioInput): boolean {
		if (typeof input === 'string' && containerFromPath(input) === 'wav') return true
		return isWav(peekInput(input, 12))
	}

	read(input: AudioInput, format?: AudioFormat): SampleBuffer {
		const opened = openInput(input)
		try {
			const { buffer } = decodeWav(opened.stream)
			return format ? convertSampleBuffer(buffer, format) : buffer
		} finally {
			opened.close()
		}
	}

	write(output: AudioOutput, buffer: SampleBuffer, format?: AudioFormat): void {
		const target = format ?? buffer.format
		streamWriteWav(output, target, (write) => write(convertSampleBuffer(buffer, target)))
	}

	streamRead(input: AudioInput, options: StreamReadOptions = {}): Generator<SampleBuffer, void, undefined> {
		return streamReadWav(input, options)
	}

	/** WAV has no write options */
	streamWrite(
		output: AudioOutput,
		format: AudioFormat,
		_options: object,
		body: (write: ChunkWriter) => void
	): WavMetadata {
		return streamWriteWav(output, format, body)
	}

	metadata(input: AudioInput): WavMetadata {
		const opened = openInput(input)
		try {
			return readWavMetadata(opened.stream)
		} finally {
			opened.close()
		}
	}
}

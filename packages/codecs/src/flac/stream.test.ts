import { createHash } from 'node:crypto'
import {
	type ByteSink,
	InvalidParameterError,
	MemoryStream,
	type SampleBuffer,
	StreamError,
	UnsupportedFormatError,
	concatSampleBuffers,
	createFormat,
	createSampleBuffer,
} from '@pcmkit/core'
import { describe, expect, it } from 'vitest'
import { decodeFlac } from './decoder'
import { encodeFlac } from './encoder'
import { FlacStreamWriter, streamReadFlac, streamWriteFlac } from './stream'
import { pcmBytes } from './streaminfo'
import type { FlacStreamWriteOptions } from './types'

const MONO_16 = createFormat({ channels: 1, sampleRate: 44100, bitDepth: 16 })

function ramp(frames: number, offset = 0): SampleBuffer {
	const samples: number[] = []
	for (let i = 0; i < frames; i++) samples.push(((i + offset) * 13) % 2000 - 1000)
	return createSampleBuffer(samples, MONO_16)
}

function writeChunks(chunks: SampleBuffer[], options: FlacStreamWriteOptions): MemoryStream {
	const stream = new MemoryStream()
	streamWriteFlac(stream, MONO_16, options, (write) => {
		for (const chunk of chunks) write(chunk)
	})
	return stream
}

class AppendOnlySink implements ByteSink {
	readonly writes: Uint8Array[] = []

	write(bytes: Uint8Array): void {
		this.writes.push(bytes)
	}
}

describe('FLAC streaming writer', () => {
	it('should split chunks into full blocks under per_chunk', () => {
		const chunks = [ramp(5000), ramp(300, 5000)]
		const { streamInfo, buffer } = decodeFlac(writeChunks(chunks, {}).toUint8Array())
		expect(streamInfo.minBlockSize).toBe(1204)
		expect(streamInfo.maxBlockSize).toBe(4096)
		expect(streamInfo.totalSamples).toBe(5300)
		expect(Array.from(buffer.samples)).toEqual(Array.from(concatSampleBuffers(chunks).samples))
	})

	it('should carry partial blocks across chunks under fixed', () => {
		const chunks = [ramp(3), ramp(5, 3)]
		const { streamInfo, buffer } = decodeFlac(
			writeChunks(chunks, { blockSize: 4, blockSizeStrategy: 'fixed' }).toUint8Array()
		)
		expect(streamInfo.minBlockSize).toBe(4)
		expect(streamInfo.maxBlockSize).toBe(4)
		expect(Array.from(buffer.samples)).toEqual(Array.from(ramp(8).samples))
	})

	it('should make one frame per chunk under source_chunk', () => {
		const chunks = [ramp(3), ramp(5, 3)]
		const { streamInfo, buffer } = decodeFlac(
			writeChunks(chunks, { blockSize: 4, blockSizeStrategy: 'source_chunk' }).toUint8Array()
		)
		expect(streamInfo.minBlockSize).toBe(3)
		expect(streamInfo.maxBlockSize).toBe(5)
		expect(Array.from(buffer.samples)).toEqual(Array.from(ramp(8).samples))
	})

	it('should reject source chunks longer than a frame allows', () => {
		const stream = new MemoryStream()
		const writer = FlacStreamWriter.open(stream, MONO_16, { blockSizeStrategy: 'source_chunk' })
		expect(() => writer.write(createSampleBuffer(new Int32Array(65537), MONO_16))).toThrow(UnsupportedFormatError)

		writer.write(createSampleBuffer([1, 2, 3, 4], MONO_16))
		const metadata = writer.close()
		expect(metadata.sampleFrameCount).toBe(4)
		expect(metadata.md5).toBe(createHash('md5').update(pcmBytes([1, 2, 3, 4], 16)).digest('hex'))
		expect(Array.from(decodeFlac(stream.toUint8Array()).buffer.samples)).toEqual([1, 2, 3, 4])
	})

	it('should patch STREAMINFO with totals and checksum', () => {
		const chunks = [ramp(100), ramp(50, 100)]
		const stream = new MemoryStream()
		const metadata = streamWriteFlac(stream, MONO_16, { blockSize: 64 }, (write) => {
			for (const chunk of chunks) write(chunk)
		})
		const expected = createHash('md5').update(pcmBytes(ramp(150).samples, 16)).digest('hex')

		expect(metadata.sampleFrameCount).toBe(150)
		expect(metadata.md5).toBe(expected)
		expect(stream.position).toBe(stream.size)

		const { streamInfo } = decodeFlac(stream.toUint8Array())
		expect(streamInfo.totalSamples).toBe(150)
		expect(Buffer.from(streamInfo.md5).toString('hex')).toBe(expected)
	})

	it('should convert chunks in another format', () => {
		const stereo = createFormat({ channels: 2, sampleRate: 44100, bitDepth: 16 })
		const stream = writeChunks([createSampleBuffer([100, 300, -50, -150], stereo)], {})
		expect(Array.from(decodeFlac(stream.toUint8Array()).buffer.samples)).toEqual([200, -100])
	})

	it('should match whole-buffer output for aligned chunks', () => {
		const chunks = [ramp(64), ramp(64, 64)]
		const streamed = writeChunks(chunks, { blockSize: 64 }).toUint8Array()
		expect(Array.from(streamed)).toEqual(Array.from(encodeFlac(ramp(128), { blockSize: 64 })))
	})

	it('should require a seekable sink before writing anything', () => {
		const sink = new AppendOnlySink()
		expect(() => streamWriteFlac(sink, MONO_16, {}, () => {})).toThrow(StreamError)
		expect(() => FlacStreamWriter.open(sink, MONO_16)).toThrow('requires a seekable output')
		expect(sink.writes).toHaveLength(0)
	})

	it('should reject unknown strategies', () => {
		const options: FlacStreamWriteOptions = {}
		Reflect.set(options, 'blockSizeStrategy', 'bogus')
		expect(() => streamWriteFlac(new MemoryStream(), MONO_16, options, () => {})).toThrow(InvalidParameterError)
	})

	it('should reject writes after close and non-buffer chunks', () => {
		const writer = FlacStreamWriter.open(new MemoryStream(), MONO_16)
		expect(() => writer.write([1, 2, 3])).toThrow(InvalidParameterError)
		writer.close()
		expect(() => writer.write(ramp(4))).toThrow(StreamError)
		expect(() => writer.close()).toThrow(StreamError)
	})
})

describe('FLAC streaming reader', () => {
	function chunkLengths(bytes: Uint8Array, chunkSize: number): number[] {
		return Array.from(streamReadFlac(bytes, { chunkSize }), (chunk) => chunk.samples.length)
	}

	it('should re-segment a frame into chunks', () => {
		expect(chunkLengths(encodeFlac(ramp(6)), 2)).toEqual([2, 2, 2])
	})

	it('should carry samples across frame boundaries', () => {
		const bytes = encodeFlac(ramp(7), { blockSize: 4 })
		expect(chunkLengths(bytes, 2)).toEqual([2, 2, 2, 1])

		const samples = Array.from(streamReadFlac(bytes, { chunkSize: 3 })).flatMap((chunk) => Array.from(chunk.samples))
		expect(samples).toEqual(Array.from(ramp(7).samples))
	})

	it('should validate the chunk size', () => {
		expect(() => chunkLengths(encodeFlac(ramp(6)), 0)).toThrow(InvalidParameterError)
	})
})

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import {
	CD_QUALITY,
	FileStream,
	InvalidFormatError,
	InvalidParameterError,
	MemoryStream,
	StreamError,
	UnsupportedFormatError,
	blockAlign,
	byteRate,
	concatSampleBuffers,
	containerFromPath,
	convertSampleBuffer,
	createFormat,
	createSampleBuffer,
	detectContainer,
	ensureSeekable,
	formatsEqual,
	getMimeType,
	isSampleBuffer,
	isSeekable,
	openInput,
	peekInput,
	sampleFrameCount,
	sliceSampleBuffer,
} from './index'
import type { ByteSink } from './index'

const MONO_16 = createFormat({ channels: 1, sampleRate: 44100, bitDepth: 16 })
const STEREO_16 = createFormat({ channels: 2, sampleRate: 44100, bitDepth: 16 })

describe('AudioFormat', () => {
	test('validates fields', () => {
		expect(() => createFormat({ channels: 0, sampleRate: 44100, bitDepth: 16 })).toThrow(
			InvalidFormatError
		)
		expect(() => createFormat({ channels: 2, sampleRate: 4000, bitDepth: 16 })).toThrow(
			InvalidFormatError
		)
		expect(() => createFormat({ channels: 2, sampleRate: 44100, bitDepth: 12 })).toThrow(
			InvalidFormatError
		)
		expect(() =>
			createFormat({ channels: 2, sampleRate: 44100, bitDepth: 16, sampleFormat: 'float' })
		).toThrow(InvalidFormatError)
		expect(() =>
			createFormat({ channels: 2, sampleRate: 44100, bitDepth: 16, sampleFormat: 'dsd' })
		).toThrow(UnsupportedFormatError)
	})

	test('derived sizes', () => {
		expect(blockAlign(CD_QUALITY)).toBe(4)
		expect(byteRate(CD_QUALITY)).toBe(176400)
		expect(formatsEqual(CD_QUALITY, STEREO_16)).toBe(true)
		expect(formatsEqual(MONO_16, STEREO_16)).toBe(false)
	})
})

describe('SampleBuffer', () => {
	test('rounds and clamps pcm samples', () => {
		const buffer = createSampleBuffer([1.4, -40000, 40000, 2.6], MONO_16)
		expect(Array.from(buffer.samples)).toEqual([1, -32768, 32767, 3])
		expect(sampleFrameCount(buffer)).toBe(4)
	})

	test('rejects a partial frame', () => {
		expect(() => createSampleBuffer([1, 2, 3], STEREO_16)).toThrow(InvalidParameterError)
	})

	test('concatenates and slices', () => {
		const a = createSampleBuffer([1, 2, 3, 4], STEREO_16)
		const b = createSampleBuffer([5, 6], STEREO_16)
		const joined = concatSampleBuffers([a, b])
		expect(Array.from(joined.samples)).toEqual([1, 2, 3, 4, 5, 6])
		expect(Array.from(sliceSampleBuffer(joined, 1, 2).samples)).toEqual([3, 4])
		expect(() => concatSampleBuffers([a, createSampleBuffer([1], MONO_16)])).toThrow(
			InvalidParameterError
		)
	})

	test('downmixes stereo to mono by averaging', () => {
		const stereo = createSampleBuffer([100, 300, -50, -150], STEREO_16)
		const mono = convertSampleBuffer(stereo, MONO_16)
		expect(Array.from(mono.samples)).toEqual([200, -100])
	})

	test('folds centre and surrounds into a stereo downmix', () => {
		const surround = createFormat({ channels: 3, sampleRate: 44100, bitDepth: 16 })
		// left 0.25, right -0.25, centre 0.125 at -3 dB into both sides
		const stereo = convertSampleBuffer(createSampleBuffer([8192, -8192, 4096], surround), STEREO_16)
		expect(Array.from(stereo.samples)).toEqual([11088, -5296])

		const loud = createFormat({ channels: 6, sampleRate: 44100, bitDepth: 16 })
		const clipped = convertSampleBuffer(createSampleBuffer(new Array(6).fill(30000), loud), STEREO_16)
		expect(Array.from(clipped.samples)).toEqual([32767, 32767])
	})

	test('folds extra channels into the kept ones', () => {
		const quad = createFormat({ channels: 4, sampleRate: 44100, bitDepth: 16 })
		const three = createFormat({ channels: 3, sampleRate: 44100, bitDepth: 16 })
		const out = convertSampleBuffer(createSampleBuffer([3000, 2000, 1000, 600], quad), three)
		expect(Array.from(out.samples)).toEqual([3200, 2200, 1200])
	})

	test('requantises 16-bit to 24-bit', () => {
		const target = createFormat({ channels: 1, sampleRate: 44100, bitDepth: 24 })
		const out = convertSampleBuffer(createSampleBuffer([1, -2], MONO_16), target)
		expect(Array.from(out.samples)).toEqual([256, -512])
	})

	test('runtime guard', () => {
		expect(isSampleBuffer(createSampleBuffer([0], MONO_16))).toBe(true)
		expect(isSampleBuffer({ format: MONO_16, samples: [0] })).toBe(false)
		expect(isSampleBuffer(null)).toBe(false)
	})
})

describe('streams', () => {
	let dir: string

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'pcmkit-core-'))
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	test('memory stream writes, seeks and reads back', () => {
		const stream = new MemoryStream()
		stream.write(new Uint8Array([1, 2, 3, 4]))
		stream.seek(1)
		stream.write(new Uint8Array([9]))
		stream.seek(0)
		expect(Array.from(stream.read(10))).toEqual([1, 9, 3, 4])
		expect(stream.read(1).length).toBe(0)
	})

	test('memory stream grows from an empty initial buffer', () => {
		const stream = new MemoryStream(new Uint8Array(0))
		stream.write(new Uint8Array([1]))
		stream.write(new Uint8Array(2000))
		expect(stream.size).toBe(2001)
		stream.seek(0)
		expect(Array.from(stream.read(1))).toEqual([1])
	})

	test('file stream patches in place', () => {
		const path = join(dir, 'out.bin')
		const file = FileStream.openWrite(path)
		file.write(new Uint8Array([0, 0, 7, 8]))
		file.seek(0)
		file.write(new Uint8Array([5, 6]))
		file.close()

		const input = openInput(path)
		expect(Array.from(input.stream.read(8))).toEqual([5, 6, 7, 8])
		input.close()
	})

	test('missing input file', () => {
		expect(() => openInput(join(dir, 'missing.flac'))).toThrow(InvalidFormatError)
	})

	test('seekability', () => {
		const sink: ByteSink = { write: () => {} }
		expect(isSeekable(new MemoryStream())).toBe(true)
		expect(isSeekable(sink)).toBe(false)
		expect(() => ensureSeekable(sink, 'patching')).toThrow(StreamError)
	})

	test('peek leaves the cursor in place', () => {
		const stream = new MemoryStream(new Uint8Array([1, 2, 3]))
		expect(Array.from(peekInput(stream, 2))).toEqual([1, 2])
		expect(stream.position).toBe(0)

		const path = join(dir, 'peek.bin')
		writeFileSync(path, new Uint8Array([4, 5, 6]))
		expect(Array.from(peekInput(path, 4))).toEqual([4, 5, 6])
	})
})

describe('container detection', () => {
	test('magic bytes', () => {
		const wav = new Uint8Array([0x52, 0x49, 0x46, 0x46, 0, 0, 0, 0, 0x57, 0x41, 0x56, 0x45])
		const flac = new Uint8Array([0x66, 0x4c, 0x61, 0x43, 0])
		expect(detectContainer(wav)).toBe('wav')
		expect(detectContainer(flac)).toBe('flac')
		expect(detectContainer(new Uint8Array([1, 2, 3]))).toBeNull()
	})

	test('extensions and mime types', () => {
		expect(containerFromPath('/tmp/song.FLAC')).toBe('flac')
		expect(containerFromPath('take.wave')).toBe('wav')
		expect(containerFromPath('dir.flac/readme')).toBeNull()
		expect(getMimeType('flac')).toBe('audio/flac')
	})
})

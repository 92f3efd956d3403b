/**
 * WAV audio format types
 * RIFF WAVE container with PCM audio data
 */

import type { AudioFormat, AudioMetadata } from '@pcmkit/core'

/** WAV audio format codes */
export const WavFormat = {
	/** Uncompressed PCM */
	PCM: 1,
	/** IEEE floating point */
	IEEE_FLOAT: 3,
	/** Extensible format, real code in the sub-format GUID */
	EXTENSIBLE: 0xfffe,
} as const

/** Four-character chunk ids */
export const RIFF_ID = 'RIFF'
export const WAVE_ID = 'WAVE'
export const FMT_ID = 'fmt '
export const DATA_ID = 'data'
export const FACT_ID = 'fact'

/** Size of a chunk id plus its 32-bit length */
export const CHUNK_HEADER_LENGTH = 8

/** Plain `fmt ` body */
export const FMT_LENGTH = 16

/** `fmt ` body with the 22-byte WAVE_FORMAT_EXTENSIBLE extension */
export const FMT_EXTENSIBLE_LENGTH = 40

/** Largest value a RIFF size field holds */
export const MAX_CHUNK_SIZE = 0xffffffff

/** Trailing 8 bytes shared by the KSDATAFORMAT sub-format GUIDs */
export const SUBFORMAT_GUID_TAIL = [0x80, 0x00, 0x00, 0xaa, 0x00, 0x38, 0x9b, 0x71]

/** Parsed `fmt ` chunk */
export interface WavFmt {
	/** Code from the chunk, before resolving the extensible sub-format */
	formatTag: number
	/** PCM or IEEE float code the samples are stored with */
	audioFormat: number
	numChannels: number
	sampleRate: number
	byteRate: number
	blockAlign: number
	bitsPerSample: number
	/** Speaker positions, extensible only */
	channelMask?: number
}

/** Where things are in a RIFF WAVE stream */
export interface WavChunkDirectory {
	fmt: WavFmt
	format: AudioFormat
	dataOffset: number
	dataSize: number
	/** Sample frames recorded in a `fact` chunk */
	factSampleLength?: number
}

/** WAV metadata, read without decoding samples */
export interface WavMetadata extends AudioMetadata {
	/** Whether the `fmt ` chunk is WAVE_FORMAT_EXTENSIBLE */
	extensible: boolean
	channelMask?: number
	factSampleLength?: number
	dataOffset: number
	dataSize: number
}

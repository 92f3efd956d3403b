/**
 * FLAC (Free Lossless Audio Codec) types
 * Lossless audio compression format
 */

import type { AudioMetadata, StreamReadOptions } from '@pcmkit/core'

/**
 * Stream marker: "fLaC"
 */
export const FLAC_MARKER = new Uint8Array([0x66, 0x4c, 0x61, 0x43])

/**
 * Metadata block types
 */
export const FlacBlockType = {
	STREAMINFO: 0,
	PADDING: 1,
	APPLICATION: 2,
	SEEKTABLE: 3,
	VORBIS_COMMENT: 4,
	CUESHEET: 5,
	PICTURE: 6,
} as const

/**
 * Channel assignment codes above the independent range (0-7)
 */
export const FlacChannelAssignment = {
	LEFT_SIDE: 8, // Left + side (difference)
	SIDE_RIGHT: 9, // Side + right
	MID_SIDE: 10, // Mid + side
} as const

/**
 * Stream info metadata
 */
export interface FlacStreamInfo {
	minBlockSize: number
	maxBlockSize: number
	minFrameSize: number
	maxFrameSize: number
	sampleRate: number
	channels: number
	bitsPerSample: number
	/** Sample frames, 0 when unknown */
	totalSamples: number
	md5: Uint8Array
}

/**
 * Metadata block header
 */
export interface FlacMetadataBlockHeader {
	type: number
	isLast: boolean
	length: number
}

/**
 * Frame header info
 */
export interface FlacFrameHeader {
	blockSize: number
	sampleRate: number
	/** Raw 4-bit code, 0-10 */
	channelAssignment: number
	channels: number
	bitsPerSample: number
	frameNumber: number
	crc8: number
}

/**
 * Decoded frame: one sample array per channel, decorrelation undone
 */
export interface FlacFrame {
	header: FlacFrameHeader
	channels: Float64Array[]
}

/**
 * Subframe type parsed from its 6-bit code
 */
export type SubframeType =
	| { kind: 'constant' }
	| { kind: 'verbatim' }
	| { kind: 'fixed'; order: number }
	| { kind: 'lpc'; order: number }

/**
 * Coding of one residual partition
 */
export type ResidualEncoding = { kind: 'rice'; parameter: number } | { kind: 'escape'; bits: number }

/**
 * How one channel of one frame is written
 */
export type SubframeEncoding =
	| { kind: 'constant'; value: number }
	| { kind: 'verbatim' }
	| { kind: 'fixed'; order: number; residual: ResidualEncoding }
	| {
			kind: 'lpc'
			order: number
			coefficients: readonly number[]
			shift: number
			precision: number
			residual: ResidualEncoding
	  }

/**
 * Running block and frame size bounds of an encode
 */
export interface EncodeStats {
	frames: number
	minBlockSize: number
	maxBlockSize: number
	minFrameSize: number
	maxFrameSize: number
}

/**
 * How streamed chunks become frames
 */
export type BlockSizeStrategy = 'per_chunk' | 'fixed' | 'source_chunk'

export const BLOCK_SIZE_STRATEGIES: readonly BlockSizeStrategy[] = ['per_chunk', 'fixed', 'source_chunk']

/**
 * Encode options
 */
export interface FlacWriteOptions {
	/** Sample frames per frame (default 4096, clamped to 65536) */
	blockSize?: number
}

export interface FlacStreamWriteOptions extends FlacWriteOptions {
	/** Default 'per_chunk' */
	blockSizeStrategy?: BlockSizeStrategy
}

/**
 * Decode options
 */
export interface FlacReadOptions {
	/** Check header CRC-8 and frame CRC-16 (default false) */
	verifyCrc?: boolean
}

export interface FlacStreamReadOptions extends StreamReadOptions, FlacReadOptions {}

/**
 * FLAC file metadata
 */
export interface FlacMetadata extends AudioMetadata {
	minBlockSize: number
	maxBlockSize: number
	minFrameSize: number
	maxFrameSize: number
	/** 32 lowercase hex characters */
	md5: string
	streamInfo: FlacStreamInfo
}

/**
 * FLAC subframe codec
 */

import { InvalidFormatError, UnsupportedFormatError } from '@pcmkit/core'
import type { BitReader, BitWriter } from './bitstream'
import {
	MAX_FIXED_ORDER,
	fixedResiduals,
	lpcResiduals,
	restoreFixed,
	restoreLpc,
} from './predictor'
import { chooseResidualEncoding, readResiduals, writeResiduals } from './residual'
import type { SubframeEncoding, SubframeType } from './types'

/** Padding bit, type code and wasted-bits flag */
const SUBFRAME_HEADER_BITS = 8

/**
 * Decode a 6-bit subframe type code
 */
export function parseSubframeType(code: number): SubframeType {
	if (code === 0) return { kind: 'constant' }
	if (code === 1) return { kind: 'verbatim' }
	if (code >= 8 && code <= 12) return { kind: 'fixed', order: code - 8 }
	if (code >= 32 && code <= 63) return { kind: 'lpc', order: (code & 0x1f) + 1 }
	throw new UnsupportedFormatError(`unsupported FLAC subframe type: ${code}`)
}

export function subframeTypeCode(type: SubframeType): number {
	switch (type.kind) {
		case 'constant':
			return 0
		case 'verbatim':
			return 1
		case 'fixed':
			return 8 + type.order
		case 'lpc':
			return 32 + type.order - 1
	}
}

/**
 * Encoding picked for one channel and its cost in bits
 */
export interface SubframeSelection {
	encoding: SubframeEncoding
	bitLength: number
}

/**
 * Cheapest of verbatim and fixed orders 0..min(4, n-1).
 * A candidate replaces the current best only when strictly smaller.
 */
export function selectSubframeEncoding(samples: ArrayLike<number>, sampleSize: number): SubframeSelection {
	let best: SubframeSelection = {
		encoding: { kind: 'verbatim' },
		bitLength: SUBFRAME_HEADER_BITS + samples.length * sampleSize,
	}

	const maxOrder = Math.min(MAX_FIXED_ORDER, samples.length - 1)
	for (let order = 0; order <= maxOrder; order++) {
		const choice = chooseResidualEncoding(fixedResiduals(samples, order))
		const bitLength = SUBFRAME_HEADER_BITS + order * sampleSize + choice.bitLength
		if (bitLength < best.bitLength) {
			best = { encoding: { kind: 'fixed', order, residual: choice.encoding }, bitLength }
		}
	}
	return best
}

/**
 * Serialise one subframe. Samples carry their wasted bits; they are shifted out here.
 */
export function writeSubframe(
	writer: BitWriter,
	samples: ArrayLike<number>,
	sampleSize: number,
	encoding: SubframeEncoding,
	wastedBits = 0
): void {
	const size = sampleSize - wastedBits
	if (size <= 0) {
		throw new RangeError(`wasted bits ${wastedBits} leave no sample bits of ${sampleSize}`)
	}
	if ((encoding.kind === 'fixed' || encoding.kind === 'lpc') && encoding.order > samples.length) {
		throw new RangeError(`predictor order ${encoding.order} exceeds block size ${samples.length}`)
	}
	const values = wastedBits > 0 ? shiftOut(samples, wastedBits) : samples

	writer.writeBits(0, 1) // padding
	writer.writeBits(subframeTypeCode(encoding), 6)
	if (wastedBits > 0) {
		writer.writeBits(1, 1)
		writer.writeUnary(wastedBits - 1)
	} else {
		writer.writeBits(0, 1)
	}

	switch (encoding.kind) {
		case 'constant':
			writer.writeSignedBits(Math.floor(encoding.value / 2 ** wastedBits), size)
			return
		case 'verbatim':
			for (let i = 0; i < values.length; i++) writer.writeSignedBits(values[i]!, size)
			return
		case 'fixed': {
			for (let i = 0; i < encoding.order; i++) writer.writeSignedBits(values[i]!, size)
			writeResiduals(writer, fixedResiduals(values, encoding.order), encoding.residual)
			return
		}
		case 'lpc': {
			if (encoding.coefficients.length !== encoding.order) {
				throw new RangeError('LPC coefficient count must equal the predictor order')
			}
			for (let i = 0; i < encoding.order; i++) writer.writeSignedBits(values[i]!, size)
			writer.writeBits(encoding.precision - 1, 4)
			writer.writeSignedBits(encoding.shift, 5)
			for (const coefficient of encoding.coefficients) {
				writer.writeSignedBits(coefficient, encoding.precision)
			}
			writeResiduals(
				writer,
				lpcResiduals(values, encoding.coefficients, encoding.shift),
				encoding.residual
			)
			return
		}
	}
}

function shiftOut(samples: ArrayLike<number>, wastedBits: number): Float64Array {
	const divisor = 2 ** wastedBits
	const out = new Float64Array(samples.length)
	for (let i = 0; i < samples.length; i++) out[i] = Math.floor(samples[i]! / divisor)
	return out
}

/**
 * Read one subframe of `blockSize` samples at `sampleSize` bits
 */
export function decodeSubframe(reader: BitReader, blockSize: number, sampleSize: number): Float64Array {
	if (reader.readBits(1) !== 0) {
		throw new InvalidFormatError('FLAC subframe padding bit is set')
	}
	const type = parseSubframeType(reader.readBits(6))
	const wastedBits = reader.readBits(1) === 1 ? reader.readUnary() + 1 : 0
	const size = sampleSize - wastedBits
	if (size <= 0) {
		throw new InvalidFormatError(`FLAC wasted bits (${wastedBits}) leave no sample bits`)
	}

	const samples = new Float64Array(blockSize)
	switch (type.kind) {
		case 'constant':
			samples.fill(reader.readSignedBits(size))
			break
		case 'verbatim':
			for (let i = 0; i < blockSize; i++) samples[i] = reader.readSignedBits(size)
			break
		case 'fixed': {
			readWarmUp(reader, samples, type.order, size)
			restoreFixed(samples, readResiduals(reader, blockSize, type.order), type.order)
			break
		}
		case 'lpc': {
			readWarmUp(reader, samples, type.order, size)
			const precisionCode = reader.readBits(4)
			if (precisionCode === 0xf) {
				throw new InvalidFormatError('invalid FLAC LPC coefficient precision')
			}
			const precision = precisionCode + 1
			const shift = reader.readSignedBits(5)
			const coefficients: number[] = []
			for (let i = 0; i < type.order; i++) coefficients.push(reader.readSignedBits(precision))
			restoreLpc(samples, readResiduals(reader, blockSize, type.order), coefficients, shift)
			break
		}
	}

	if (wastedBits > 0) {
		const factor = 2 ** wastedBits
		for (let i = 0; i < blockSize; i++) samples[i] = samples[i]! * factor
	}
	return samples
}

function readWarmUp(reader: BitReader, samples: Float64Array, order: number, size: number): void {
	if (order > samples.length) {
		throw new InvalidFormatError(`FLAC predictor order ${order} exceeds block size ${samples.length}`)
	}
	for (let i = 0; i < order; i++) samples[i] = reader.readSignedBits(size)
}

/**
 * Partitioned Rice residual coder
 */

import { InvalidFormatError, UnsupportedFormatError } from '@pcmkit/core'
import type { BitReader, BitWriter } from './bitstream'
import type { ResidualEncoding } from './types'

export const MAX_RICE_PARAMETER = 14
export const MAX_ESCAPE_BITS = 31

/** Coding method, partition order and parameter fields of a single partition */
const PARTITION_HEADER_BITS = 2 + 4 + 4
const ESCAPE_WIDTH_BITS = 5

export function zigzag(value: number): number {
	return value >= 0 ? value * 2 : -value * 2 - 1
}

/**
 * Smallest two's complement width holding the value (0 for zero)
 */
export function signedBitWidth(value: number): number {
	if (value === 0) return 0
	let bits = 1
	while (value < -(2 ** (bits - 1)) || value > 2 ** (bits - 1) - 1) bits++
	return bits
}

/**
 * Exact bit cost of one partition-order-0 Rice coded residual block
 */
export function riceBitLength(residuals: ArrayLike<number>, parameter: number): number {
	const divisor = 2 ** parameter
	let bits = PARTITION_HEADER_BITS
	for (let i = 0; i < residuals.length; i++) {
		bits += Math.floor(zigzag(residuals[i] ?? 0) / divisor) + 1 + parameter
	}
	return bits
}

/**
 * Cheapest coding for a partition-order-0 residual block.
 * Ties keep the lowest Rice parameter, Rice wins over escape.
 */
export function chooseResidualEncoding(residuals: ArrayLike<number>): {
	encoding: ResidualEncoding
	bitLength: number
} {
	let best: { encoding: ResidualEncoding; bitLength: number } = {
		encoding: { kind: 'rice', parameter: 0 },
		bitLength: riceBitLength(residuals, 0),
	}
	for (let parameter = 1; parameter <= MAX_RICE_PARAMETER; parameter++) {
		const bitLength = riceBitLength(residuals, parameter)
		if (bitLength < best.bitLength) {
			best = { encoding: { kind: 'rice', parameter }, bitLength }
		}
	}

	let width = 0
	for (let i = 0; i < residuals.length; i++) {
		width = Math.max(width, signedBitWidth(residuals[i] ?? 0))
	}
	if (width <= MAX_ESCAPE_BITS) {
		const bitLength = PARTITION_HEADER_BITS + ESCAPE_WIDTH_BITS + residuals.length * width
		if (bitLength < best.bitLength) {
			best = { encoding: { kind: 'escape', bits: width }, bitLength }
		}
	}
	return best
}

/**
 * Write a residual block as a single partition with coding method 0
 */
export function writeResiduals(
	writer: BitWriter,
	residuals: ArrayLike<number>,
	encoding: ResidualEncoding
): void {
	writer.writeBits(0, 2) // coding method 0, 4-bit parameters
	writer.writeBits(0, 4) // partition order 0

	if (encoding.kind === 'rice') {
		writer.writeBits(encoding.parameter, 4)
		for (let i = 0; i < residuals.length; i++) {
			writer.writeRiceSigned(residuals[i] ?? 0, encoding.parameter)
		}
		return
	}

	writer.writeBits(0xf, 4)
	writer.writeBits(encoding.bits, ESCAPE_WIDTH_BITS)
	for (let i = 0; i < residuals.length; i++) {
		writer.writeSignedBits(residuals[i] ?? 0, encoding.bits)
	}
}

/**
 * Read `blockSize - order` residuals in any partition order
 */
export function readResiduals(reader: BitReader, blockSize: number, order: number): Float64Array {
	const method = reader.readBits(2)
	if (method > 1) {
		throw new UnsupportedFormatError(`unsupported FLAC residual coding method: ${method}`)
	}
	const parameterBits = method === 0 ? 4 : 5
	const escape = method === 0 ? 0xf : 0x1f

	const partitionOrder = reader.readBits(4)
	const partitions = 2 ** partitionOrder
	if (blockSize % partitions !== 0) {
		throw new InvalidFormatError(
			`FLAC block size ${blockSize} is not divisible into ${partitions} residual partitions`
		)
	}
	const perPartition = blockSize / partitions
	if (perPartition - order < 0) {
		throw new InvalidFormatError('FLAC predictor order exceeds the first residual partition')
	}

	const residuals = new Float64Array(blockSize - order)
	let index = 0
	for (let p = 0; p < partitions; p++) {
		const count = p === 0 ? perPartition - order : perPartition
		const parameter = reader.readBits(parameterBits)

		if (parameter === escape) {
			const width = reader.readBits(ESCAPE_WIDTH_BITS)
			// Width 0: every residual is zero
			for (let i = 0; i < count; i++) {
				residuals[index++] = width === 0 ? 0 : reader.readSignedBits(width)
			}
			continue
		}

		for (let i = 0; i < count; i++) {
			residuals[index++] = reader.readRiceSigned(parameter)
		}
	}
	return residuals
}

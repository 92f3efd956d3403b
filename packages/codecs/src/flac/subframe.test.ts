import { InvalidFormatError, UnsupportedFormatError } from '@pcmkit/core'
import { describe, expect, it } from 'vitest'
import { BitReader, BitWriter, ByteReader } from './bitstream'
import { decorrelateChannels, restoreChannels, subframeSampleSizes } from './channels'
import { fixedResiduals, lpcPrediction, lpcResiduals, restoreFixed } from './predictor'
import { chooseResidualEncoding, readResiduals, signedBitWidth, writeResiduals } from './residual'
import { decodeSubframe, parseSubframeType, selectSubframeEncoding, writeSubframe } from './subframe'
import { FlacChannelAssignment, type SubframeEncoding } from './types'

function readerFor(writer: BitWriter): BitReader {
	writer.alignToByte()
	return new BitReader(ByteReader.fromBytes(writer.getBytes()))
}

function roundTrip(samples: number[], size: number, encoding: SubframeEncoding, wastedBits = 0): number[] {
	const writer = new BitWriter()
	writeSubframe(writer, samples, size, encoding, wastedBits)
	return Array.from(decodeSubframe(readerFor(writer), samples.length, size))
}

describe('FLAC predictors', () => {
	it('should compute fixed residuals of each order', () => {
		const samples = [1, 4, 9, 16, 25, 36]
		expect(Array.from(fixedResiduals(samples, 0))).toEqual(samples)
		expect(Array.from(fixedResiduals(samples, 1))).toEqual([3, 5, 7, 9, 11])
		expect(Array.from(fixedResiduals(samples, 2))).toEqual([2, 2, 2, 2])
		expect(Array.from(fixedResiduals(samples, 3))).toEqual([0, 0, 0])
		expect(Array.from(fixedResiduals(samples, 4))).toEqual([0, 0])
	})

	it('should restore samples from warm-up and residuals', () => {
		const restored = new Float64Array([1, 4, 0, 0, 0, 0])
		restoreFixed(restored, [2, 2, 2, 2], 2)
		expect(Array.from(restored)).toEqual([1, 4, 9, 16, 25, 36])
	})

	it('should shift LPC sums arithmetically', () => {
		// (3 * -5) >> 1 floors to -8
		expect(lpcPrediction([-5, 0], 1, [3], 1)).toBe(-8)
		// negative shift multiplies
		expect(lpcPrediction([7, 0], 1, [1], -2)).toBe(28)
		expect(Array.from(lpcResiduals([100, 105, 110, 115], [4, -2], 1))).toEqual([0, 0])
	})
})

describe('FLAC subframe writer', () => {
	it('should refuse a predictor order longer than the block', () => {
		const writer = new BitWriter()
		const encoding: SubframeEncoding = { kind: 'fixed', order: 3, residual: { kind: 'rice', parameter: 0 } }
		expect(() => writeSubframe(writer, [5, 6], 16, encoding)).toThrow('predictor order 3 exceeds block size 2')
	})
})

describe('FLAC residual coder', () => {
	it('should measure two\'s complement widths', () => {
		expect(signedBitWidth(0)).toBe(0)
		expect(signedBitWidth(-1)).toBe(1)
		expect(signedBitWidth(1)).toBe(2)
		expect(signedBitWidth(-8)).toBe(4)
		expect(signedBitWidth(2 ** 30 - 1)).toBe(31)
		expect(signedBitWidth(-(2 ** 30))).toBe(31)
	})

	it('should prefer the lowest Rice parameter on ties', () => {
		// zero residuals cost 13 bits with Rice and 15 with escape
		expect(chooseResidualEncoding([0, 0, 0])).toEqual({
			encoding: { kind: 'rice', parameter: 0 },
			bitLength: 13,
		})
	})

	it('should pick the exact cheapest parameter', () => {
		// zig-zag values 20 cost 6 bits each at p=3..5, escape costs 5 each plus 5
		expect(chooseResidualEncoding([10, 10, 10, 10, 10, 10, 10])).toEqual({
			encoding: { kind: 'escape', bits: 5 },
			bitLength: 50,
		})
		expect(chooseResidualEncoding([40, -41, 38, -37])).toEqual({
			encoding: { kind: 'rice', parameter: 5 },
			bitLength: 10 + 4 * 8,
		})
	})

	it('should escape residuals wider than 30 bits', () => {
		const residuals = [2 ** 30 - 1, -(2 ** 30), 12345, -(2 ** 29)]
		const choice = chooseResidualEncoding(residuals)
		expect(choice.encoding).toEqual({ kind: 'escape', bits: 31 })

		const writer = new BitWriter()
		writeResiduals(writer, residuals, choice.encoding)
		expect(Array.from(readResiduals(readerFor(writer), 4, 0))).toEqual(residuals)
	})

	it('should never escape beyond 31 bits', () => {
		expect(chooseResidualEncoding([2 ** 31 - 1]).encoding).toEqual({ kind: 'rice', parameter: 14 })
	})

	it('should decode foreign partition layouts', () => {
		const writer = new BitWriter()
		writer.writeBits(1, 2) // 5-bit parameters
		writer.writeBits(1, 4) // two partitions of 4
		writer.writeBits(3, 5)
		writer.writeRiceSigned(5, 3)
		writer.writeRiceSigned(-6, 3)
		writer.writeBits(0x1f, 5) // escape
		writer.writeBits(4, 5)
		for (const value of [7, -8, 0, 1]) writer.writeSignedBits(value, 4)

		expect(Array.from(readResiduals(readerFor(writer), 8, 2))).toEqual([5, -6, 7, -8, 0, 1])
	})

	it('should read zero-width escape partitions as zeros', () => {
		const writer = new BitWriter()
		writer.writeBits(0, 2)
		writer.writeBits(0, 4)
		writer.writeBits(0xf, 4)
		writer.writeBits(0, 5)
		expect(Array.from(readResiduals(readerFor(writer), 4, 1))).toEqual([0, 0, 0])
	})

	it('should reject bad partition layouts', () => {
		const partitions = (order: number, method = 0): BitReader => {
			const writer = new BitWriter()
			writer.writeBits(method, 2)
			writer.writeBits(order, 4)
			writer.writeBits(0, 16)
			return readerFor(writer)
		}
		expect(() => readResiduals(partitions(2), 6, 0)).toThrow(InvalidFormatError)
		expect(() => readResiduals(partitions(3), 8, 2)).toThrow(InvalidFormatError)
		expect(() => readResiduals(partitions(0, 2), 8, 0)).toThrow(UnsupportedFormatError)
	})
})

describe('FLAC subframes', () => {
	it('should map type codes', () => {
		expect(parseSubframeType(0)).toEqual({ kind: 'constant' })
		expect(parseSubframeType(1)).toEqual({ kind: 'verbatim' })
		expect(parseSubframeType(10)).toEqual({ kind: 'fixed', order: 2 })
		expect(parseSubframeType(32)).toEqual({ kind: 'lpc', order: 1 })
		expect(parseSubframeType(63)).toEqual({ kind: 'lpc', order: 32 })
		for (const code of [2, 7, 13, 31]) {
			expect(() => parseSubframeType(code)).toThrow(UnsupportedFormatError)
		}
	})

	it('should round-trip verbatim and constant subframes', () => {
		expect(roundTrip([0, 1000, -1000, 32767], 16, { kind: 'verbatim' })).toEqual([0, 1000, -1000, 32767])
		expect(roundTrip([-42, -42, -42], 16, { kind: 'constant', value: -42 })).toEqual([-42, -42, -42])
	})

	it('should restore wasted bits', () => {
		expect(roundTrip([12, -8, 20, 0], 16, { kind: 'verbatim' }, 2)).toEqual([12, -8, 20, 0])
		expect(roundTrip([64, 64, 64, 64], 16, { kind: 'constant', value: 64 }, 3)).toEqual([64, 64, 64, 64])
	})

	it('should round-trip fixed order 2', () => {
		const samples = [1000, 1010, 1020, 1030, 1040, 1050]
		const residual = chooseResidualEncoding(fixedResiduals(samples, 2)).encoding
		expect(roundTrip(samples, 16, { kind: 'fixed', order: 2, residual })).toEqual(samples)
	})

	it('should decode LPC subframes', () => {
		const first = [1000, 1004, 1010, 1008, 1015, 1015]
		expect(
			roundTrip(first, 16, {
				kind: 'lpc',
				order: 1,
				coefficients: [1],
				shift: 0,
				precision: 4,
				residual: { kind: 'rice', parameter: 2 },
			})
		).toEqual(first)

		const ramp = [100, 105, 110, 115, 120, 125]
		expect(
			roundTrip(ramp, 16, {
				kind: 'lpc',
				order: 2,
				coefficients: [4, -2],
				shift: 1,
				precision: 5,
				residual: { kind: 'rice', parameter: 0 },
			})
		).toEqual(ramp)
	})

	it('should pick a fixed predictor for a ramp', () => {
		const samples = [1000, 1010, 1020, 1030, 1040, 1050, 1060, 1070]
		expect(selectSubframeEncoding(samples, 16)).toEqual({
			encoding: { kind: 'fixed', order: 2, residual: { kind: 'escape', bits: 0 } },
			bitLength: 8 + 2 * 16 + 15,
		})
	})

	it('should fall back to verbatim only when it is cheaper', () => {
		// order 0 costs 8 + 15 against 8 + 16
		expect(selectSubframeEncoding([5], 16).encoding.kind).toBe('fixed')
		expect(selectSubframeEncoding([-32768], 16).encoding).toEqual({ kind: 'verbatim' })
	})

	it('should reject malformed subframes', () => {
		const decode = (write: (writer: BitWriter) => void, blockSize = 4, size = 16): Float64Array => {
			const writer = new BitWriter()
			write(writer)
			writer.writeBits(0, 32)
			return decodeSubframe(readerFor(writer), blockSize, size)
		}

		expect(() => decode((w) => w.writeBits(0b1_000001_0, 8))).toThrow('padding')
		expect(() => decode((w) => w.writeBits(0b0_001101_0, 8))).toThrow(/subframe type/)
		// wasted bits flag with count 4 on a 4-bit subframe
		expect(() => decode((w) => w.writeBits(0b0_000001_1_0001, 12), 4, 4)).toThrow(InvalidFormatError)
		// fixed order 4 on a 2-sample block
		expect(() => decode((w) => w.writeBits(0b0_001100_0, 8), 2)).toThrow(InvalidFormatError)
		// LPC precision code 15
		expect(() => decode((w) => {
			w.writeBits(0b0_100000_0, 8)
			w.writeBits(0, 16)
			w.writeBits(0xf, 4)
		})).toThrow('precision')
	})
})

describe('FLAC channel decorrelation', () => {
	it('should give the side channel one extra bit', () => {
		expect(subframeSampleSizes(1, 2, 16)).toEqual([16, 16])
		expect(subframeSampleSizes(FlacChannelAssignment.LEFT_SIDE, 2, 16)).toEqual([16, 17])
		expect(subframeSampleSizes(FlacChannelAssignment.SIDE_RIGHT, 2, 16)).toEqual([17, 16])
		expect(subframeSampleSizes(FlacChannelAssignment.MID_SIDE, 2, 16)).toEqual([16, 17])
	})

	it('should restore each stereo assignment', () => {
		const left = [101, 115, 130, 145]
		const right = [98, 110, 123, 139]
		for (const assignment of [
			FlacChannelAssignment.LEFT_SIDE,
			FlacChannelAssignment.SIDE_RIGHT,
			FlacChannelAssignment.MID_SIDE,
		]) {
			const restored = restoreChannels(assignment, decorrelateChannels(assignment, left, right))
			expect(restored.map((channel) => Array.from(channel))).toEqual([left, right])
		}
	})

	it('should refuse channels of different lengths', () => {
		expect(() => decorrelateChannels(FlacChannelAssignment.LEFT_SIDE, [1, 2], [1])).toThrow(RangeError)
		expect(() =>
			restoreChannels(FlacChannelAssignment.MID_SIDE, [new Float64Array(2), new Float64Array(3)])
		).toThrow('channel lengths differ: 2 and 3')
	})

	it('should recover the odd bit dropped from mid', () => {
		const [mid, side] = decorrelateChannels(FlacChannelAssignment.MID_SIDE, [-3], [2])
		expect([mid[0], side[0]]).toEqual([-1, -5])
		const [left, right] = restoreChannels(FlacChannelAssignment.MID_SIDE, [mid, side])
		expect([left?.[0], right?.[0]]).toEqual([-3, 2])
	})
})

/**
 * Stereo decorrelation
 */

import { FlacChannelAssignment } from './types'

export function isDecorrelated(assignment: number): boolean {
	return (
		assignment === FlacChannelAssignment.LEFT_SIDE ||
		assignment === FlacChannelAssignment.SIDE_RIGHT ||
		assignment === FlacChannelAssignment.MID_SIDE
	)
}

/**
 * Bits per subframe; the side channel carries one extra bit
 */
export function subframeSampleSizes(assignment: number, channels: number, bitsPerSample: number): number[] {
	const sizes = new Array<number>(channels).fill(bitsPerSample)
	if (assignment === FlacChannelAssignment.SIDE_RIGHT) {
		sizes[0] = bitsPerSample + 1
	} else if (assignment === FlacChannelAssignment.LEFT_SIDE || assignment === FlacChannelAssignment.MID_SIDE) {
		sizes[1] = bitsPerSample + 1
	}
	return sizes
}

/**
 * Undo decorrelation, returning [left, right] for stereo assignments.
 * Independent channels pass through.
 */
export function restoreChannels(assignment: number, decoded: Float64Array[]): Float64Array[] {
	const [first, second] = decoded
	if (!isDecorrelated(assignment) || !first || !second) return decoded

	const length = first.length
	if (second.length !== length) {
		throw new RangeError(`channel lengths differ: ${length} and ${second.length}`)
	}
	const left = new Float64Array(length)
	const right = new Float64Array(length)

	for (let i = 0; i < length; i++) {
		const a = first[i]!
		const b = second[i]!
		switch (assignment) {
			case FlacChannelAssignment.LEFT_SIDE:
				left[i] = a
				right[i] = a - b
				break
			case FlacChannelAssignment.SIDE_RIGHT:
				left[i] = a + b
				right[i] = b
				break
			default: {
				// mid was stored as (left + right) >> 1; the side parity restores the dropped bit
				const mid = a * 2 + (((b % 2) + 2) % 2)
				left[i] = Math.floor((mid + b) / 2)
				right[i] = Math.floor((mid - b) / 2)
			}
		}
	}
	return [left, right]
}

/**
 * Inverse of restoreChannels: the two subframe channels for a stereo assignment
 */
export function decorrelateChannels(
	assignment: number,
	left: ArrayLike<number>,
	right: ArrayLike<number>
): [Float64Array, Float64Array] {
	const length = left.length
	if (right.length !== length) {
		throw new RangeError(`channel lengths differ: ${length} and ${right.length}`)
	}
	const first = new Float64Array(length)
	const second = new Float64Array(length)

	for (let i = 0; i < length; i++) {
		const l = left[i]!
		const r = right[i]!
		switch (assignment) {
			case FlacChannelAssignment.LEFT_SIDE:
				first[i] = l
				second[i] = l - r
				break
			case FlacChannelAssignment.SIDE_RIGHT:
				first[i] = l - r
				second[i] = r
				break
			case FlacChannelAssignment.MID_SIDE:
				first[i] = Math.floor((l + r) / 2)
				second[i] = l - r
				break
			default:
				first[i] = l
				second[i] = r
		}
	}
	return [first, second]
}

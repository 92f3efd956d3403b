/**
 * Fixed and linear predictors
 *
 * LPC sums stay below 2^53 (15-bit coefficients, 33-bit samples, 32 taps),
 * so number accumulation is exact.
 */

export const MAX_FIXED_ORDER = 4

/**
 * Fixed polynomial prediction of samples[index] from the `order` samples before it
 */
export function fixedPrediction(samples: ArrayLike<number>, index: number, order: number): number {
	switch (order) {
		case 0:
			return 0
		case 1:
			return samples[index - 1]!
		case 2:
			return 2 * samples[index - 1]! - samples[index - 2]!
		case 3:
			return 3 * samples[index - 1]! - 3 * samples[index - 2]! + samples[index - 3]!
		case 4:
			return (
				4 * samples[index - 1]! -
				6 * samples[index - 2]! +
				4 * samples[index - 3]! -
				samples[index - 4]!
			)
		default:
			throw new RangeError(`fixed predictor order must be 0-${MAX_FIXED_ORDER}: ${order}`)
	}
}

/**
 * Residuals after the `order` warm-up samples
 */
export function fixedResiduals(samples: ArrayLike<number>, order: number): Float64Array {
	const residuals = new Float64Array(Math.max(0, samples.length - order))
	for (let i = order; i < samples.length; i++) {
		residuals[i - order] = samples[i]! - fixedPrediction(samples, i, order)
	}
	return residuals
}

/**
 * Rebuild samples in place; samples[0..order) already hold the warm-up values
 */
export function restoreFixed(samples: Float64Array, residuals: ArrayLike<number>, order: number): void {
	for (let i = order; i < samples.length; i++) {
		samples[i] = fixedPrediction(samples, i, order) + residuals[i - order]!
	}
}

/**
 * Quantised LPC prediction, arithmetically shifted right by `shift` (left when negative)
 */
export function lpcPrediction(
	samples: ArrayLike<number>,
	index: number,
	coefficients: readonly number[],
	shift: number
): number {
	let sum = 0
	for (let j = 0; j < coefficients.length; j++) {
		sum += coefficients[j]! * samples[index - 1 - j]!
	}
	return shift >= 0 ? Math.floor(sum / 2 ** shift) : sum * 2 ** -shift
}

export function lpcResiduals(
	samples: ArrayLike<number>,
	coefficients: readonly number[],
	shift: number
): Float64Array {
	const order = coefficients.length
	const residuals = new Float64Array(Math.max(0, samples.length - order))
	for (let i = order; i < samples.length; i++) {
		residuals[i - order] = samples[i]! - lpcPrediction(samples, i, coefficients, shift)
	}
	return residuals
}

export function restoreLpc(
	samples: Float64Array,
	residuals: ArrayLike<number>,
	coefficients: readonly number[],
	shift: number
): void {
	const order = coefficients.length
	for (let i = order; i < samples.length; i++) {
		samples[i] = lpcPrediction(samples, i, coefficients, shift) + residuals[i - order]!
	}
}

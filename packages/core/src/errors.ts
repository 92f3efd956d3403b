/**
 * Error taxonomy shared by every codec
 *
 * Callers tell a broken file (InvalidFormatError) from a valid file using an
 * unimplemented feature (UnsupportedFormatError) and from their own bad input
 * (InvalidParameterError) by class.
 */

export abstract class PcmkitError extends Error {
	readonly name: string = 'PcmkitError'
	readonly cause?: unknown
	protected constructor(message: string, cause?: unknown) {
		super(message)
		this.cause = cause
	}
}

export abstract class FormatError extends PcmkitError {
	readonly name: string = 'FormatError'
}

/** Malformed or inconsistent data for a supported format */
export class InvalidFormatError extends FormatError {
	readonly name = 'InvalidFormatError'
	constructor(message: string, cause?: unknown) {
		super(message, cause)
	}
}

/** Recognised but not implemented */
export class UnsupportedFormatError extends FormatError {
	readonly name = 'UnsupportedFormatError'
	constructor(message: string, cause?: unknown) {
		super(message, cause)
	}
}

export class CodecNotFoundError extends FormatError {
	readonly name = 'CodecNotFoundError'
	constructor(
		message: string,
		public readonly target?: string,
		cause?: unknown
	) {
		super(message, cause)
	}
}

export abstract class ProcessingError extends PcmkitError {
	readonly name: string = 'ProcessingError'
}

export class BufferConversionError extends ProcessingError {
	readonly name = 'BufferConversionError'
	constructor(message: string, cause?: unknown) {
		super(message, cause)
	}
}

/** A streaming operation cannot proceed (non-seekable target, closed writer) */
export class StreamError extends ProcessingError {
	readonly name = 'StreamError'
	constructor(message: string, cause?: unknown) {
		super(message, cause)
	}
}

export class InvalidParameterError extends PcmkitError {
	readonly name = 'InvalidParameterError'
	constructor(message: string, cause?: unknown) {
		super(message, cause)
	}
}

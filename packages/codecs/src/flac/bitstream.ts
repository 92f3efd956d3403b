/**
 * Byte and bit level I/O for FLAC streams
 *
 * Field values are plain numbers. Widths up to 53 bits stay exact, so shifts
 * beyond 31 bits go through multiplication and division by powers of two.
 */

import { type ByteSource, InvalidFormatError, MemoryStream } from '@pcmkit/core'

const READ_BUFFER_SIZE = 64 * 1024

/**
 * Buffered reader over a byte source
 */
export class ByteReader {
	private chunk: Uint8Array = new Uint8Array(0)
	private offset = 0
	private consumed = 0
	private capture: MemoryStream | null = null

	constructor(private readonly source: ByteSource) {}

	static fromBytes(data: Uint8Array): ByteReader {
		return new ByteReader(new MemoryStream(data))
	}

	/** Bytes consumed so far */
	get position(): number {
		return this.consumed
	}

	/**
	 * Next byte, or undefined at end of input
	 */
	readByte(): number | undefined {
		if (this.offset >= this.chunk.length && !this.fill()) return undefined
		const byte = this.chunk[this.offset++]
		this.consumed++
		if (byte !== undefined && this.capture) this.capture.write(new Uint8Array([byte]))
		return byte
	}

	/**
	 * Exactly `length` bytes or a truncation error
	 */
	readBytes(length: number, what = 'FLAC data'): Uint8Array {
		const out = new Uint8Array(length)
		let filled = 0
		while (filled < length) {
			if (this.offset >= this.chunk.length && !this.fill()) {
				throw new InvalidFormatError(`truncated ${what}`)
			}
			const take = Math.min(length - filled, this.chunk.length - this.offset)
			out.set(this.chunk.subarray(this.offset, this.offset + take), filled)
			this.offset += take
			filled += take
		}
		this.consumed += length
		if (this.capture) this.capture.write(out)
		return out
	}

	atEnd(): boolean {
		return this.offset >= this.chunk.length && !this.fill()
	}

	/**
	 * Start recording consumed bytes
	 */
	beginCapture(): void {
		this.capture = new MemoryStream()
	}

	/**
	 * Bytes consumed since beginCapture
	 */
	captured(): Uint8Array {
		return this.capture ? this.capture.toUint8Array() : new Uint8Array(0)
	}

	endCapture(): void {
		this.capture = null
	}

	private fill(): boolean {
		this.chunk = this.source.read(READ_BUFFER_SIZE)
		this.offset = 0
		return this.chunk.length > 0
	}
}

/**
 * MSB-first bit reader, pulling one byte at a time
 */
export class BitReader {
	private current = 0
	private bitsLeft = 0

	constructor(private readonly bytes: ByteReader) {}

	readBits(n: number): number {
		let value = 0
		let remaining = n
		while (remaining > 0) {
			if (this.bitsLeft === 0) this.load()
			const take = Math.min(remaining, this.bitsLeft)
			const shift = this.bitsLeft - take
			const chunk = (this.current >> shift) & ((1 << take) - 1)
			value = value * 2 ** take + chunk
			this.bitsLeft -= take
			remaining -= take
		}
		return value
	}

	/**
	 * Two's complement, sign taken from bit n-1
	 */
	readSignedBits(n: number): number {
		if (n === 0) return 0
		const value = this.readBits(n)
		return value >= 2 ** (n - 1) ? value - 2 ** n : value
	}

	/**
	 * Count zero bits up to and including the terminating one
	 */
	readUnary(): number {
		let count = 0
		for (;;) {
			if (this.bitsLeft === 0) this.load()
			const rest = this.current & ((1 << this.bitsLeft) - 1)
			if (rest === 0) {
				count += this.bitsLeft
				this.bitsLeft = 0
				continue
			}
			const width = 32 - Math.clz32(rest)
			count += this.bitsLeft - width
			this.bitsLeft = width - 1
			return count
		}
	}

	/**
	 * Zig-zag mapped Rice code with parameter p
	 */
	readRiceSigned(parameter: number): number {
		const quotient = this.readUnary()
		const remainder = parameter > 0 ? this.readBits(parameter) : 0
		const unsigned = quotient * 2 ** parameter + remainder
		return unsigned % 2 === 0 ? unsigned / 2 : -(unsigned + 1) / 2
	}

	/**
	 * Drop the rest of a partially read byte
	 */
	alignToByte(): void {
		this.bitsLeft = 0
	}

	private load(): void {
		const byte = this.bytes.readByte()
		if (byte === undefined) {
			throw new InvalidFormatError('truncated FLAC frame')
		}
		this.current = byte
		this.bitsLeft = 8
	}
}

/**
 * MSB-first bit writer
 */
export class BitWriter {
	private buffer: Uint8Array = new Uint8Array(256)
	private length = 0
	private current = 0
	private bitsInByte = 0

	/** Whole bytes written */
	get byteLength(): number {
		return this.length
	}

	get bitLength(): number {
		return this.length * 8 + this.bitsInByte
	}

	/**
	 * Write the low n bits of a non-negative integer
	 */
	writeBits(value: number, n: number): void {
		let remaining = n
		while (remaining > 0) {
			const take = Math.min(remaining, 8 - this.bitsInByte)
			const chunk = Math.floor(value / 2 ** (remaining - take)) % 2 ** take
			this.current = (this.current << take) | chunk
			this.bitsInByte += take
			remaining -= take
			if (this.bitsInByte === 8) this.flushByte()
		}
	}

	/**
	 * Two's complement, masked to n bits
	 */
	writeSignedBits(value: number, n: number): void {
		if (n === 0) return
		const modulus = 2 ** n
		this.writeBits(((value % modulus) + modulus) % modulus, n)
	}

	/**
	 * `count` zero bits followed by a one
	 */
	writeUnary(count: number): void {
		let zeros = count
		while (zeros > 0) {
			const take = Math.min(zeros, 24)
			this.writeBits(0, take)
			zeros -= take
		}
		this.writeBits(1, 1)
	}

	writeRiceSigned(value: number, parameter: number): void {
		const unsigned = value >= 0 ? value * 2 : -value * 2 - 1
		const divisor = 2 ** parameter
		this.writeUnary(Math.floor(unsigned / divisor))
		if (parameter > 0) this.writeBits(unsigned % divisor, parameter)
	}

	writeBytes(bytes: Uint8Array): void {
		if (this.bitsInByte === 0) {
			this.reserve(bytes.length)
			this.buffer.set(bytes, this.length)
			this.length += bytes.length
			return
		}
		for (const byte of bytes) this.writeBits(byte, 8)
	}

	/**
	 * Zero-pad the partial byte
	 */
	alignToByte(): void {
		if (this.bitsInByte > 0) this.writeBits(0, 8 - this.bitsInByte)
	}

	/**
	 * Copy of the whole bytes written so far
	 */
	getBytes(): Uint8Array {
		return this.buffer.slice(0, this.length)
	}

	private flushByte(): void {
		this.reserve(1)
		this.buffer[this.length++] = this.current
		this.current = 0
		this.bitsInByte = 0
	}

	private reserve(extra: number): void {
		const needed = this.length + extra
		if (needed <= this.buffer.length) return
		let size = this.buffer.length * 2
		while (size < needed) size *= 2
		const grown = new Uint8Array(size)
		grown.set(this.buffer.subarray(0, this.length))
		this.buffer = grown
	}
}

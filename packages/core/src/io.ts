/**
 * Byte streams
 * Synchronous sources and sinks over memory and file descriptors
 */

import { closeSync, existsSync, fstatSync, openSync, readSync, writeSync } from 'node:fs'
import { InvalidFormatError, StreamError } from './errors'

/** Sample frames per buffer when streaming reads don't say */
export const DEFAULT_CHUNK_SIZE = 4096

/**
 * Anything bytes can be read from. Returns fewer bytes than requested at end of input.
 */
export interface ByteSource {
	read(length: number): Uint8Array
}

/**
 * Anything bytes can be written to
 */
export interface ByteSink {
	write(bytes: Uint8Array): void
}

/**
 * Random access over a stream
 */
export interface Seekable {
	readonly position: number
	seek(position: number): void
}

export function isSeekable(stream: object): stream is Seekable {
	return (
		'seek' in stream &&
		typeof stream.seek === 'function' &&
		'position' in stream &&
		typeof stream.position === 'number'
	)
}

/**
 * Narrow a sink to a seekable one or fail with a StreamError
 */
export function ensureSeekable<T extends object>(stream: T, purpose: string): T & Seekable {
	if (!isSeekable(stream)) {
		throw new StreamError(`${purpose} requires a seekable output`)
	}
	return stream
}

/**
 * Growable in-memory stream
 */
export class MemoryStream implements ByteSource, ByteSink, Seekable {
	private data: Uint8Array
	private length: number
	private cursor = 0

	constructor(initial?: Uint8Array) {
		this.data = initial ? initial.slice() : new Uint8Array(1024)
		this.length = initial ? initial.length : 0
	}

	get position(): number {
		return this.cursor
	}

	get size(): number {
		return this.length
	}

	seek(position: number): void {
		if (!Number.isInteger(position) || position < 0) {
			throw new StreamError(`invalid seek position: ${position}`)
		}
		this.cursor = position
	}

	read(length: number): Uint8Array {
		const end = Math.min(this.length, this.cursor + length)
		if (end <= this.cursor) return new Uint8Array(0)
		const bytes = this.data.slice(this.cursor, end)
		this.cursor = end
		return bytes
	}

	write(bytes: Uint8Array): void {
		const end = this.cursor + bytes.length
		this.reserve(end)
		// Seeking past the end leaves a zero-filled gap
		this.data.set(bytes, this.cursor)
		this.cursor = end
		if (end > this.length) this.length = end
	}

	toUint8Array(): Uint8Array {
		return this.data.slice(0, this.length)
	}

	private reserve(capacity: number): void {
		if (capacity <= this.data.length) return
		let next = Math.max(1024, this.data.length * 2)
		while (next < capacity) next *= 2
		const grown = new Uint8Array(next)
		grown.set(this.data.subarray(0, this.length))
		this.data = grown
	}
}

/**
 * File descriptor stream with positional reads and writes
 */
export class FileStream implements ByteSource, ByteSink, Seekable {
	private cursor = 0
	private closed = false

	private constructor(
		private readonly fd: number,
		readonly path: string
	) {}

	static openRead(path: string): FileStream {
		if (!existsSync(path)) {
			throw new InvalidFormatError(`file not found: ${path}`)
		}
		return new FileStream(openSync(path, 'r'), path)
	}

	static openWrite(path: string): FileStream {
		return new FileStream(openSync(path, 'w+'), path)
	}

	get position(): number {
		return this.cursor
	}

	get size(): number {
		return fstatSync(this.fd).size
	}

	seek(position: number): void {
		if (!Number.isInteger(position) || position < 0) {
			throw new StreamError(`invalid seek position: ${position}`)
		}
		this.cursor = position
	}

	read(length: number): Uint8Array {
		this.assertOpen()
		const bytes = new Uint8Array(length)
		let filled = 0
		while (filled < length) {
			const count = readSync(this.fd, bytes, filled, length - filled, this.cursor)
			if (count === 0) break
			filled += count
			this.cursor += count
		}
		return filled === length ? bytes : bytes.subarray(0, filled)
	}

	write(bytes: Uint8Array): void {
		this.assertOpen()
		let written = 0
		while (written < bytes.length) {
			written += writeSync(this.fd, bytes, written, bytes.length - written, this.cursor + written)
		}
		this.cursor += written
	}

	close(): void {
		if (this.closed) return
		this.closed = true
		closeSync(this.fd)
	}

	private assertOpen(): void {
		if (this.closed) throw new StreamError(`file is closed: ${this.path}`)
	}
}

/**
 * An opened stream plus the cleanup for whatever was opened on the caller's behalf
 */
export interface Opened<T> {
	stream: T
	close(): void
}

function noop(): void {}

/**
 * Resolve a path, bytes or an existing source to a readable stream
 */
export function openInput(input: string | Uint8Array | ByteSource): Opened<ByteSource> {
	if (typeof input === 'string') {
		const file = FileStream.openRead(input)
		return { stream: file, close: () => file.close() }
	}
	if (input instanceof Uint8Array) {
		return { stream: new MemoryStream(input), close: noop }
	}
	return { stream: input, close: noop }
}

/**
 * Resolve a path or an existing sink to a writable stream
 */
export function openOutput(output: string | ByteSink): Opened<ByteSink> {
	if (typeof output === 'string') {
		const file = FileStream.openWrite(output)
		return { stream: file, close: () => file.close() }
	}
	return { stream: output, close: noop }
}

/**
 * Read up to `length` bytes from the start of an input without consuming it
 */
export function peekInput(input: string | Uint8Array | ByteSource, length: number): Uint8Array {
	if (input instanceof Uint8Array) return input.subarray(0, length)
	if (typeof input === 'string') {
		if (!existsSync(input)) return new Uint8Array(0)
		const file = FileStream.openRead(input)
		try {
			return file.read(length)
		} finally {
			file.close()
		}
	}
	if (!isSeekable(input)) return new Uint8Array(0)
	const start = input.position
	const bytes = input.read(length)
	input.seek(start)
	return bytes
}

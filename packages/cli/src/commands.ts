/**
 * CLI commands: info and convert
 */

import { createHash, type Hash } from 'node:crypto'
import { existsSync, statSync } from 'node:fs'
import { basename, resolve } from 'node:path'
import { type SampleBuffer, InvalidParameterError, StreamError, describeFormat, getMimeType } from '@pcmkit/core'
import { codecForPath, detectCodec } from '@pcmkit/codecs'
import type { CliOptions } from './args'

/**
 * Where the CLI writes. `verbose` lines only show with --verbose, and
 * --quiet drops everything but errors.
 */
export interface Output {
	info(line: string): void
	verbose(line: string): void
	error(line: string): void
}

export function consoleOutput(options: CliOptions): Output {
	return {
		info: (line) => {
			if (!options.quiet) console.log(line)
		},
		verbose: (line) => {
			if (options.verbose && !options.quiet) console.log(line)
		},
		error: (line) => console.error(line),
	}
}

export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

/**
 * Print container, format and length of each file
 */
export function showInfo(path: string, out: Output): void {
	if (!existsSync(path)) {
		throw new InvalidParameterError(`file not found: ${path}`)
	}

	const codec = detectCodec(path)
	out.info(`Source: ${path}`)
	out.info(`Size: ${formatBytes(statSync(path).size)}`)
	out.info(`Container: ${codec.name} (${getMimeType(codec.name)})`)

	if (codec.name === 'flac') {
		const metadata = codec.metadata(path)
		out.info(`Format: ${describeFormat(metadata.format)}`)
		out.info(`Sample frames: ${metadata.sampleFrameCount}`)
		out.info(`Duration: ${metadata.duration.toFixed(3)} s`)
		out.info(`Block size: ${metadata.minBlockSize}-${metadata.maxBlockSize}`)
		out.info(`Frame size: ${metadata.minFrameSize}-${metadata.maxFrameSize} bytes`)
		out.info(`MD5: ${metadata.md5}`)
	} else {
		const metadata = codec.metadata(path)
		out.info(`Format: ${describeFormat(metadata.format)}`)
		out.info(`Sample frames: ${metadata.sampleFrameCount}`)
		out.info(`Duration: ${metadata.duration.toFixed(3)} s`)
		out.verbose(`Layout: ${metadata.extensible ? 'extensible' : 'plain'} fmt chunk`)
		out.verbose(`Data: ${metadata.dataSize} bytes at offset ${metadata.dataOffset}`)
	}
}

function updateDigest(hash: Hash, buffer: SampleBuffer): void {
	const { samples } = buffer
	hash.update(new Uint8Array(samples.buffer, samples.byteOffset, samples.byteLength))
}

/**
 * Stream one file into another container, chosen by the output's extension
 */
export function convert(input: string, output: string, options: CliOptions, out: Output): void {
	if (!existsSync(input)) {
		throw new InvalidParameterError(`file not found: ${input}`)
	}
	if (resolve(input) === resolve(output)) {
		throw new InvalidParameterError('input and output are the same file')
	}
	if (existsSync(output) && !options.overwrite) {
		throw new InvalidParameterError(`output exists: ${output} (use --overwrite)`)
	}

	const flacRead = { verifyCrc: options.verify === true }
	const reader = detectCodec(input, { flacRead })
	const writer = codecForPath(output)
	const { format } = reader.metadata(input)

	out.info(`${basename(input)} → ${basename(output)}`)
	out.verbose(`Format: ${describeFormat(format)}`)

	const written = createHash('sha256')
	const metadata = writer.streamWrite(
		output,
		format,
		{ blockSize: options.blockSize, blockSizeStrategy: options.strategy },
		(write) => {
			for (const chunk of reader.streamRead(input, { chunkSize: options.chunkSize })) {
				updateDigest(written, chunk)
				write(chunk)
			}
		}
	)

	out.verbose(`Sample frames: ${metadata.sampleFrameCount}`)
	out.verbose(`Size: ${formatBytes(statSync(output).size)}`)

	if (options.verify) {
		const readBack = createHash('sha256')
		let frames = 0
		for (const chunk of codecForPath(output, { flacRead }).streamRead(output)) {
			updateDigest(readBack, chunk)
			frames += chunk.samples.length / format.channels
		}
		if (frames !== metadata.sampleFrameCount || readBack.digest('hex') !== written.digest('hex')) {
			throw new StreamError(`verification failed: ${output} does not match ${input}`)
		}
		out.verbose('Verified: output decodes to the input samples')
	}
}

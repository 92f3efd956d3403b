/**
 * Command-line argument parser
 */

import { InvalidParameterError } from '@pcmkit/core'
import { BLOCK_SIZE_STRATEGIES, type BlockSizeStrategy, isBlockSizeStrategy } from '@pcmkit/codecs'

export type Command = 'info' | 'convert'

export interface CliOptions {
	// Encoding
	blockSize?: number
	strategy?: BlockSizeStrategy
	chunkSize?: number

	// Output
	overwrite?: boolean
	verify?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	command?: Command
	inputs: string[]
	options: CliOptions
}

function isCommand(value: string): value is Command {
	return value === 'info' || value === 'convert'
}

function positiveInt(flag: string, value: string | undefined): number {
	const parsed = Number(value)
	if (value === undefined || !Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidParameterError(`${flag} expects a positive integer, got ${value ?? 'nothing'}`)
	}
	return parsed
}

/**
 * Parse argv (without node and script). Unknown options are an error.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
	const inputs: string[] = []
	const options: CliOptions = {}
	let command: Command | undefined

	let i = 0
	while (i < args.length) {
		const arg = args[i] ?? ''

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet' || arg === '-q') {
			options.quiet = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if (arg === '--verify') {
			options.verify = true
		} else if (arg === '--block-size' || arg === '-b') {
			options.blockSize = positiveInt(arg, args[++i])
		} else if (arg === '--chunk-size' || arg === '-c') {
			options.chunkSize = positiveInt(arg, args[++i])
		} else if (arg === '--strategy' || arg === '-s') {
			const value = args[++i]
			if (value === undefined || !isBlockSizeStrategy(value)) {
				throw new InvalidParameterError(
					`${arg} expects one of ${BLOCK_SIZE_STRATEGIES.join(', ')}, got ${value ?? 'nothing'}`
				)
			}
			options.strategy = value
		} else if (!arg.startsWith('-') || arg === '-') {
			if (command === undefined && inputs.length === 0 && isCommand(arg)) {
				command = arg
			} else {
				inputs.push(arg)
			}
		} else {
			throw new InvalidParameterError(`Unknown option: ${arg}`)
		}

		i++
	}

	return { command, inputs, options }
}

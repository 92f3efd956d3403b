/**
 * pcmkit CLI - lossless audio conversion and inspection
 */

import { PcmkitError } from '@pcmkit/core'
import { type CliOptions, parseArgs } from './args'
import { type Output, consoleOutput, convert, showInfo } from './commands'

export const VERSION = '0.1.0'

export const HELP = `
pcmkit - Lossless audio toolkit (FLAC and WAV)

USAGE:
  pcmkit info <file...>                Show container, format and length
  pcmkit convert <input> <output>      Convert by output extension (.flac, .wav)

OPTIONS:
  -b, --block-size <n>    FLAC block size in sample frames (default 4096)
  -s, --strategy <name>   FLAC block sizing: per_chunk, fixed, source_chunk
  -c, --chunk-size <n>    Sample frames read per chunk (default 4096)
  --overwrite             Overwrite an existing output file
  --verify                Check FLAC CRCs and re-read the output after writing
  -v, --verbose           Verbose output
  -q, --quiet             Suppress everything but errors
  -h, --help              Show this help
  -V, --version           Show version

EXAMPLES:
  pcmkit convert take.wav take.flac
  pcmkit convert take.wav take.flac --block-size 1152 --strategy fixed
  pcmkit convert take.flac take.wav --verify
  pcmkit info take.flac
`

function run(command: string | undefined, inputs: string[], options: CliOptions, out: Output): number {
	switch (command) {
		case 'info': {
			if (inputs.length === 0) {
				out.error('Error: info requires at least one file')
				return 1
			}
			inputs.forEach((input, index) => {
				if (index > 0) out.info('')
				showInfo(input, out)
			})
			return 0
		}
		case 'convert': {
			const [input, output] = inputs
			if (input === undefined || output === undefined || inputs.length > 2) {
				out.error('Error: convert requires <input> and <output>')
				return 1
			}
			convert(input, output, options, out)
			return 0
		}
		default:
			if (inputs.length > 0) {
				out.error(`Error: unknown command: ${inputs[0]}`)
				return 1
			}
			out.info(HELP)
			return 0
	}
}

/**
 * Run the CLI and return its exit status
 */
export function main(argv: readonly string[], output?: Output): number {
	let out = output ?? consoleOutput({})
	try {
		const { command, inputs, options } = parseArgs(argv)
		out = output ?? consoleOutput(options)

		if (options.help) {
			out.info(HELP)
			return 0
		}
		if (options.version) {
			out.info(`pcmkit v${VERSION}`)
			return 0
		}
		return run(command, inputs, options, out)
	} catch (error) {
		if (!(error instanceof PcmkitError)) throw error
		out.error(`Error: ${error.message}`)
		return 1
	}
}

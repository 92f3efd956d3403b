#!/usr/bin/env tsx
/**
 * pcmkit command-line entry point
 */

import { main } from './cli'

try {
	process.exitCode = main(process.argv.slice(2))
} catch (err) {
	console.error('Fatal error:', err)
	process.exitCode = 1
}

import type { AudioContainer } from './types'

interface Magic {
	bytes: number[]
	offset?: number
}

/**
 * Magic bytes for container detection
 */
const MAGIC_BYTES: Record<string, Magic> = {
	riff: { bytes: [0x52, 0x49, 0x46, 0x46] }, // "RIFF"
	wave: { bytes: [0x57, 0x41, 0x56, 0x45], offset: 8 }, // "WAVE"
	flac: { bytes: [0x66, 0x4c, 0x61, 0x43] }, // "fLaC"
}

const EXTENSIONS: Record<string, AudioContainer> = {
	wav: 'wav',
	wave: 'wav',
	flac: 'flac',
}

const MIME_TYPES: Record<AudioContainer, string> = {
	wav: 'audio/wav',
	flac: 'audio/flac',
}

/**
 * Check if bytes match a magic signature
 */
export function matchMagic(data: Uint8Array, magic: Magic): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

export function isWavHeader(data: Uint8Array): boolean {
	const { riff, wave } = MAGIC_BYTES
	return riff !== undefined && wave !== undefined && matchMagic(data, riff) && matchMagic(data, wave)
}

export function isFlacHeader(data: Uint8Array): boolean {
	const { flac } = MAGIC_BYTES
	return flac !== undefined && matchMagic(data, flac)
}

/**
 * Detect container from leading bytes (RIFF/WAVE is checked first)
 */
export function detectContainer(data: Uint8Array): AudioContainer | null {
	if (isWavHeader(data)) return 'wav'
	if (isFlacHeader(data)) return 'flac'
	return null
}

/**
 * Container implied by a file name's extension
 */
export function containerFromPath(path: string): AudioContainer | null {
	const dot = path.lastIndexOf('.')
	if (dot < 0 || dot < path.lastIndexOf('/')) return null
	return EXTENSIONS[path.slice(dot + 1).toLowerCase()] ?? null
}

export function getExtension(container: AudioContainer): string {
	return container
}

export function getMimeType(container: AudioContainer): string {
	return MIME_TYPES[container]
}

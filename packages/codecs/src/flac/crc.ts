/**
 * Frame checksums, computed bit-serially without reflection
 */

/**
 * CRC-8 (polynomial 0x07) over the frame header
 */
export function crc8(data: Uint8Array, initial = 0): number {
	let crc = initial
	for (let i = 0; i < data.length; i++) {
		crc ^= data[i] ?? 0
		for (let j = 0; j < 8; j++) {
			if (crc & 0x80) {
				crc = ((crc << 1) ^ 0x07) & 0xff
			} else {
				crc = (crc << 1) & 0xff
			}
		}
	}
	return crc
}

/**
 * CRC-16 (polynomial 0x8005) over a whole frame
 */
export function crc16(data: Uint8Array, initial = 0): number {
	let crc = initial
	for (let i = 0; i < data.length; i++) {
		crc ^= (data[i] ?? 0) << 8
		for (let j = 0; j < 8; j++) {
			if (crc & 0x8000) {
				crc = ((crc << 1) ^ 0x8005) & 0xffff
			} else {
				crc = (crc << 1) & 0xffff
			}
		}
	}
	return crc
}

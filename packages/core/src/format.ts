import type { ImageFormat } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<ImageFormat, { bytes: number[]; offset?: number }> = {
	png: { bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
	jpeg: { bytes: [0xff, 0xd8, 0xff] },
}

const EXTENSIONS: Record<string, ImageFormat> = {
	png: 'png',
	jpg: 'jpeg',
	jpeg: 'jpeg',
}

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: { bytes: number[]; offset?: number }): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	if (matchMagic(data, MAGIC_BYTES.png)) return 'png'
	if (matchMagic(data, MAGIC_BYTES.jpeg)) return 'jpeg'
	return null
}

/**
 * Guess format from a file path's extension (case-insensitive)
 */
export function formatFromPath(path: string): ImageFormat | null {
	const dot = path.lastIndexOf('.')
	if (dot === -1 || dot < path.lastIndexOf('/')) return null
	return EXTENSIONS[path.slice(dot + 1).toLowerCase()] ?? null
}

/**
 * Get file extension for format
 */
export function getExtension(format: ImageFormat): string {
	if (format === 'jpeg') return 'jpg'
	return format
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: ImageFormat): string {
	return `image/${format}`
}

import { readFile, writeFile } from 'node:fs/promises'
import { decodeImage, encodeImage } from '@overmark/codecs'
import type { ImageData, ImageFormat, Raster } from '@overmark/core'
import { formatFromPath } from '@overmark/core'

/**
 * Save options
 */
export interface SaveOptions {
	/** Output format. Defaults to the format named by the path's extension */
	format?: ImageFormat
	/** JPEG quality (1-100) */
	quality?: number
}

/**
 * Read and decode a PNG or JPEG file.
 * File system errors and DecodeError propagate unchanged.
 */
export async function loadImage(path: string): Promise<Raster> {
	const data = await readFile(path)
	return decodeImage(new Uint8Array(data.buffer, data.byteOffset, data.byteLength))
}

/**
 * Encode an image and write it to `path`
 */
export async function saveImage(path: string, image: ImageData, options: SaveOptions = {}): Promise<void> {
	const format = options.format ?? formatFromPath(path)
	if (!format) {
		throw new Error(`Cannot determine output format from path: ${path}`)
	}

	const encoded = await encodeImage(image, format, { quality: options.quality })
	await writeFile(path, encoded)
}

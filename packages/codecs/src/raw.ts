/**
 * Raw RGBA pipelines through sharp
 */

import type { ImageData } from '@overmark/core'
import sharp from 'sharp'

/**
 * Start a sharp pipeline over raw RGBA pixels
 */
export function fromImageData(image: ImageData): sharp.Sharp {
	const { width, height, data } = image
	return sharp(Buffer.from(data.buffer, data.byteOffset, data.byteLength), {
		raw: { width, height, channels: 4 },
	})
}

/**
 * Decode any image sharp understands into straight RGBA, adding an opaque
 * alpha channel when the input has none
 */
export async function toImageData(input: Uint8Array): Promise<ImageData> {
	const { data, info } = await sharp(input)
		.ensureAlpha()
		.toColourspace('srgb')
		.raw()
		.toBuffer({ resolveWithObject: true })

	return {
		width: info.width,
		height: info.height,
		data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
	}
}

/**
 * Copy a sharp output buffer into a plain Uint8Array
 */
export function toBytes(buffer: Buffer): Uint8Array {
	return new Uint8Array(buffer)
}

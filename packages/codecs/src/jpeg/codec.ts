import type { EncodeOptions, ImageCodec, ImageData } from '@overmark/core'
import { premultiplyAlpha } from '@overmark/core'
import { fromImageData, toBytes, toImageData } from '../raw'

export const DEFAULT_JPEG_QUALITY = 85

/**
 * JPEG quality actually used: integers in [1, 100] pass, anything else becomes 85
 */
export function normalizeQuality(quality?: number): number {
	if (quality === undefined || !Number.isInteger(quality) || quality < 1 || quality > 100) {
		return DEFAULT_JPEG_QUALITY
	}
	return quality
}

/**
 * Encode image as JPEG. JPEG has no alpha channel: the premultiplied color
 * channels are written, which flattens translucent pixels onto black.
 */
export async function encodeJpeg(image: ImageData, options?: EncodeOptions): Promise<Uint8Array> {
	const quality = normalizeQuality(options?.quality)
	const buffer = await fromImageData(premultiplyAlpha(image)).removeAlpha().jpeg({ quality }).toBuffer()
	return toBytes(buffer)
}

/**
 * JPEG codec implementation
 */
export const JpegCodec: ImageCodec = {
	format: 'jpeg',

	decode(data: Uint8Array): Promise<ImageData> {
		return toImageData(data)
	},

	encode(image: ImageData, options?: EncodeOptions): Promise<Uint8Array> {
		return encodeJpeg(image, options)
	},
}

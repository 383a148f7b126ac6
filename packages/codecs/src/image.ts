import type { EncodeOptions, ImageCodec, ImageData, ImageFormat, Raster } from '@overmark/core'
import { DecodeError, detectFormat, toRaster } from '@overmark/core'
import { JpegCodec } from './jpeg/codec'
import { PngCodec } from './png/codec'

/**
 * Registry of available codecs
 */
const codecs: Record<ImageFormat, ImageCodec> = {
	jpeg: JpegCodec,
	png: PngCodec,
}

/**
 * Look up the codec for a format
 */
export function getCodec(format: ImageFormat): ImageCodec {
	return codecs[format]
}

/**
 * Decode PNG or JPEG bytes into a raster at the origin
 */
export async function decodeImage(data: Uint8Array): Promise<Raster> {
	const format = detectFormat(data)
	if (!format) {
		throw new DecodeError('Unknown or unsupported image format')
	}

	let image: ImageData
	try {
		image = await codecs[format].decode(data)
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err)
		throw new DecodeError(`Failed to decode ${format.toUpperCase()} data: ${reason}`, { cause: err })
	}

	return toRaster(image)
}

/**
 * Encode image in the given format
 */
export function encodeImage(image: ImageData, format: ImageFormat, options?: EncodeOptions): Promise<Uint8Array> {
	return codecs[format].encode(image, options)
}

import type { ImageCodec, ImageData } from '@overmark/core'
import { unpremultiplyAlpha } from '@overmark/core'
import { fromImageData, toBytes, toImageData } from '../raw'

/**
 * Encode image as 8-bit RGBA PNG. PNG stores straight alpha, so premultiplied
 * input is converted first; straight input is written losslessly.
 */
export async function encodePng(image: ImageData): Promise<Uint8Array> {
	const buffer = await fromImageData(unpremultiplyAlpha(image)).png({ palette: false }).toBuffer()
	return toBytes(buffer)
}

/**
 * PNG codec implementation
 */
export const PngCodec: ImageCodec = {
	format: 'png',

	decode(data: Uint8Array): Promise<ImageData> {
		return toImageData(data)
	},

	encode(image: ImageData): Promise<Uint8Array> {
		return encodePng(image)
	},
}

/**
 * Conversions between straight and premultiplied RGBA buffers
 */

import type { ImageData } from './types'
import { narrow, premultiply } from './types'

/**
 * Premultiply alpha. Already premultiplied input is returned as is.
 */
export function premultiplyAlpha(image: ImageData): ImageData {
	if (image.premultiplied) return image

	const { width, height, data } = image
	const output = new Uint8Array(data.length)

	for (let i = 0; i < data.length; i += 4) {
		const [r, g, b, a] = narrow(premultiply([data[i]!, data[i + 1]!, data[i + 2]!, data[i + 3]!]))
		output[i] = r
		output[i + 1] = g
		output[i + 2] = b
		output[i + 3] = a
	}

	return { width, height, data: output, premultiplied: true }
}

/**
 * Unpremultiply alpha: c * 65535 / a on the 16-bit scale, then the high byte.
 * Channels above their alpha overflow the byte and wrap.
 */
export function unpremultiplyAlpha(image: ImageData): ImageData {
	if (!image.premultiplied) return image

	const { width, height, data } = image
	const output = new Uint8Array(data.length)

	for (let i = 0; i < data.length; i += 4) {
		const a = data[i + 3]!
		if (a === 0xff) {
			output.set(data.subarray(i, i + 4), i)
			continue
		}
		// Fully transparent stays zeroed
		if (a === 0) continue

		output[i] = Math.floor((data[i]! * 0xffff) / a) >> 8
		output[i + 1] = Math.floor((data[i + 1]! * 0xffff) / a) >> 8
		output[i + 2] = Math.floor((data[i + 2]! * 0xffff) / a) >> 8
		output[i + 3] = a
	}

	return { width, height, data: output }
}

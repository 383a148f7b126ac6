/**
 * Per-pixel alpha compositing
 */

import type { Color, Color64 } from '@overmark/core'
import { narrow } from '@overmark/core'

/**
 * Blend one overlay pixel onto one base pixel.
 *
 * Channels arrive premultiplied on the 16-bit scale; the overlay weight is its own alpha
 * times `opacity`. Color channels are truncated to 8 bits, never rounded.
 * The result keeps the base alpha.
 */
export function blendColors(base: Color64, overlay: Color64, opacity: number): Color {
	// Fully transparent overlay pixel leaves the base untouched
	if (overlay[3] === 0) {
		return narrow(base)
	}

	const alpha = (overlay[3] / 65535) * opacity

	return [
		Math.trunc((base[0] >> 8) * (1 - alpha) + (overlay[0] >> 8) * alpha),
		Math.trunc((base[1] >> 8) * (1 - alpha) + (overlay[1] >> 8) * alpha),
		Math.trunc((base[2] >> 8) * (1 - alpha) + (overlay[2] >> 8) * alpha),
		base[3] >> 8,
	]
}

/**
 * Single watermark placement
 */

import type { PixelSource, Raster } from '@overmark/core'
import { copyToRaster, drawOverlay } from './draw'
import { computeOffset } from './placement'
import { DEFAULT_WATERMARK_OPTIONS, type WatermarkOptions } from './types'

/**
 * Opacity used by `apply`: values <= 0 (or NaN) become 0.5, values above 1 become 1
 */
export function normalizeOpacity(opacity: number): number {
	if (!(opacity > 0)) return 0.5
	if (opacity > 1) return 1
	return opacity
}

/**
 * Stamp `overlay` once onto a copy of `base`. The base is never modified.
 */
export function apply(base: PixelSource, overlay: PixelSource, options: WatermarkOptions = {}): Raster {
	const {
		position = DEFAULT_WATERMARK_OPTIONS.position,
		opacity = DEFAULT_WATERMARK_OPTIONS.opacity,
		paddingX = DEFAULT_WATERMARK_OPTIONS.paddingX,
		paddingY = DEFAULT_WATERMARK_OPTIONS.paddingY,
	} = options

	const canvas = copyToRaster(base)
	const offset = computeOffset(
		canvas.width,
		canvas.height,
		overlay.bounds.width,
		overlay.bounds.height,
		position,
		paddingX,
		paddingY
	)

	drawOverlay(canvas, overlay, offset.x, offset.y, normalizeOpacity(opacity))

	return canvas
}

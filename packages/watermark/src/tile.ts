/**
 * Tiled watermark pattern
 */

import type { PixelSource, Raster } from '@overmark/core'
import { copyToRaster, drawOverlay } from './draw'
import type { TileOptions } from './types'

/**
 * Repeat `overlay` across a copy of `base` on a grid starting at the base origin.
 *
 * Tiles step by overlay size plus `spacing` and clip at the right and bottom edges.
 * Opacity is passed through as given. With negative spacing tiles overlap and are
 * drawn row by row, left to right, so later tiles land on top.
 */
export function tile(base: PixelSource, overlay: PixelSource, options: TileOptions): Raster {
	const { opacity, spacing } = options
	const canvas = copyToRaster(base)

	// A stride below 1 would never leave the first tile
	const strideX = Math.max(1, overlay.bounds.width + spacing)
	const strideY = Math.max(1, overlay.bounds.height + spacing)

	for (let ty = 0; ty < canvas.height; ty += strideY) {
		for (let tx = 0; tx < canvas.width; tx += strideX) {
			drawOverlay(canvas, overlay, tx, ty, opacity)
		}
	}

	return canvas
}

/**
 * Number of tiles `tile` draws for the given sizes
 */
export function countTiles(
	baseWidth: number,
	baseHeight: number,
	overlayWidth: number,
	overlayHeight: number,
	spacing: number
): number {
	if (baseWidth <= 0 || baseHeight <= 0) return 0
	const strideX = Math.max(1, overlayWidth + spacing)
	const strideY = Math.max(1, overlayHeight + spacing)
	return Math.ceil(baseWidth / strideX) * Math.ceil(baseHeight / strideY)
}

/**
 * Canvas helpers shared by the placement and tiling renderers
 */

import type { PixelSource, Raster } from '@overmark/core'
import { createRaster, narrow, setPixel } from '@overmark/core'
import { blendColors } from './blend'

/**
 * Allocate a premultiplied raster over the source bounds and copy every source pixel into it
 */
export function copyToRaster(source: PixelSource): Raster {
	const { bounds } = source
	const canvas = createRaster(bounds)

	for (let y = 0; y < bounds.height; y++) {
		for (let x = 0; x < bounds.width; x++) {
			setPixel(canvas, x, y, narrow(source.at(bounds.x + x, bounds.y + y)))
		}
	}

	return canvas
}

/**
 * Composite `overlay` onto `canvas` with its top-left corner at (x, y), relative to
 * the canvas origin. Pixels landing outside the canvas are skipped. Each pixel blends
 * against the canvas as it currently stands.
 */
export function drawOverlay(
	canvas: Raster,
	overlay: PixelSource,
	x: number,
	y: number,
	opacity: number
): void {
	const { width, height, bounds } = canvas
	const { x: overlayX, y: overlayY, width: overlayWidth, height: overlayHeight } = overlay.bounds

	for (let oy = 0; oy < overlayHeight; oy++) {
		const destY = y + oy
		if (destY < 0 || destY >= height) continue

		for (let ox = 0; ox < overlayWidth; ox++) {
			const destX = x + ox
			if (destX < 0 || destX >= width) continue

			const base = canvas.at(bounds.x + destX, bounds.y + destY)
			const color = overlay.at(overlayX + ox, overlayY + oy)
			setPixel(canvas, destX, destY, blendColors(base, color, opacity))
		}
	}
}

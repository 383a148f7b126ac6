import type { Raster } from '@overmark/core'
import { type TileOptions, type WatermarkOptions, apply, tile } from '@overmark/watermark'
import { loadImage } from './image'

/**
 * Load both images from disk and stamp the watermark once.
 * The source is read first; the first failure is thrown as is.
 */
export async function applyFromFiles(
	srcPath: string,
	watermarkPath: string,
	options: WatermarkOptions = {}
): Promise<Raster> {
	const src = await loadImage(srcPath)
	const watermark = await loadImage(watermarkPath)
	return apply(src, watermark, options)
}

/**
 * Load both images from disk and tile the watermark across the source
 */
export async function tileFromFiles(srcPath: string, watermarkPath: string, options: TileOptions): Promise<Raster> {
	const src = await loadImage(srcPath)
	const watermark = await loadImage(watermarkPath)
	return tile(src, watermark, options)
}

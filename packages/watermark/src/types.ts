/**
 * Watermark types
 */

/** Named anchor for a single watermark placement */
export type Position = 'center' | 'topLeft' | 'topRight' | 'bottomLeft' | 'bottomRight'

/** Single placement options */
export interface WatermarkOptions {
	/** Anchor inside the base image */
	position?: Position
	/** Opacity (0-1). Values <= 0 fall back to 0.5, values > 1 clamp to 1 */
	opacity?: number
	/** Horizontal distance from the anchored edge. Ignored for center */
	paddingX?: number
	/** Vertical distance from the anchored edge. Ignored for center */
	paddingY?: number
}

/** Tiled pattern options */
export interface TileOptions {
	/** Opacity, used as given */
	opacity: number
	/** Gap in pixels between tiles on both axes */
	spacing: number
}

export const POSITIONS: readonly Position[] = ['center', 'topLeft', 'topRight', 'bottomLeft', 'bottomRight']

export const DEFAULT_WATERMARK_OPTIONS: Readonly<Required<WatermarkOptions>> = {
	position: 'bottomRight',
	opacity: 0.5,
	paddingX: 10,
	paddingY: 10,
}

/**
 * Fresh copy of the default placement options
 */
export function defaultWatermarkOptions(): Required<WatermarkOptions> {
	return { ...DEFAULT_WATERMARK_OPTIONS }
}

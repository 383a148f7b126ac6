import type { Point } from '@overmark/core'
import type { Position } from './types'

/**
 * Top-left corner for an overlay anchored at `position`, relative to the base origin.
 * No bounds checks: the result may be negative or push the overlay off the base.
 */
export function computeOffset(
	baseWidth: number,
	baseHeight: number,
	overlayWidth: number,
	overlayHeight: number,
	position: Position,
	paddingX: number,
	paddingY: number
): Point {
	switch (position) {
		case 'center':
			return {
				x: Math.trunc((baseWidth - overlayWidth) / 2),
				y: Math.trunc((baseHeight - overlayHeight) / 2),
			}
		case 'topLeft':
			return { x: paddingX, y: paddingY }
		case 'topRight':
			return { x: baseWidth - overlayWidth - paddingX, y: paddingY }
		case 'bottomLeft':
			return { x: paddingX, y: baseHeight - overlayHeight - paddingY }
		case 'bottomRight':
			return { x: baseWidth - overlayWidth - paddingX, y: baseHeight - overlayHeight - paddingY }
	}
}

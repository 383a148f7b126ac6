/**
 * @overmark/watermark - Watermark compositing, placement and tiling
 */

export * from './types'
export * from './blend'
export * from './placement'
export * from './draw'
export * from './apply'
export * from './tile'

/**
 * overmark - Stamp watermarks onto JPEG and PNG images
 */

// Re-export core types and utilities
export * from '@overmark/core'

// Re-export codecs and the watermark core
export * from '@overmark/codecs'
export * from '@overmark/watermark'

// File helpers
export { loadImage, saveImage, type SaveOptions } from './image'
export { applyFromFiles, tileFromFiles } from './files'

/**
 * @overmark/core - Image data model, pixel access and format detection
 */

export * from './types'
export * from './alpha'
export * from './format'
export * from './errors'

/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255). Color channels are straight
 * unless `premultiplied` is set.
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
	readonly premultiplied?: boolean
}

/**
 * Integer pixel coordinate
 */
export interface Point {
	readonly x: number
	readonly y: number
}

/**
 * Bounding rectangle. The origin need not be (0, 0)
 */
export interface Rect {
	readonly x: number
	readonly y: number
	readonly width: number
	readonly height: number
}

/**
 * 8-bit RGBA color (0-255 per channel)
 */
export type Color = readonly [r: number, g: number, b: number, a: number]

/**
 * 16-bit RGBA color (0-65535 per channel)
 */
export type Color64 = readonly [r: number, g: number, b: number, a: number]

/**
 * Anything that can hand out pixels on a bounded rectangle.
 * `at` takes absolute coordinates and returns alpha-premultiplied channels;
 * outside `bounds` it returns transparent black.
 */
export interface PixelSource {
	readonly bounds: Rect
	at(x: number, y: number): Color64
}

/**
 * Mutable 8-bit RGBA buffer that is also a pixel source
 */
export interface Raster extends ImageData, PixelSource {}

/**
 * Supported image formats
 */
export type ImageFormat = 'png' | 'jpeg'

/**
 * Encode options
 */
export interface EncodeOptions {
	quality?: number // 1-100
}

/**
 * Image codec
 */
export interface ImageCodec {
	readonly format: ImageFormat
	decode(data: Uint8Array): Promise<ImageData>
	encode(image: ImageData, options?: EncodeOptions): Promise<Uint8Array>
}

export const ORIGIN: Point = { x: 0, y: 0 }

const TRANSPARENT: Color64 = [0, 0, 0, 0]

/**
 * Widen an 8-bit color to 16 bits (v * 257, so v64 >> 8 === v)
 */
export function widen(color: Color): Color64 {
	return [color[0] * 0x101, color[1] * 0x101, color[2] * 0x101, color[3] * 0x101]
}

/**
 * Premultiply a straight 8-bit color into 16 bits: c * 257 * a / 255, truncated
 */
export function premultiply(color: Color): Color64 {
	const a = color[3]
	return [
		Math.floor((color[0] * 0x101 * a) / 0xff),
		Math.floor((color[1] * 0x101 * a) / 0xff),
		Math.floor((color[2] * 0x101 * a) / 0xff),
		a * 0x101,
	]
}

/**
 * Narrow a 16-bit color to 8 bits by dropping the low byte
 */
export function narrow(color: Color64): Color {
	return [color[0] >> 8, color[1] >> 8, color[2] >> 8, color[3] >> 8]
}

/**
 * Create empty ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * Clone ImageData
 */
export function cloneImageData(image: ImageData): ImageData {
	return {
		width: image.width,
		height: image.height,
		data: new Uint8Array(image.data),
		premultiplied: image.premultiplied,
	}
}

/**
 * Get pixel at (x, y)
 */
export function getPixel(image: ImageData, x: number, y: number): Color {
	const idx = (y * image.width + x) * 4
	return [image.data[idx]!, image.data[idx + 1]!, image.data[idx + 2]!, image.data[idx + 3]!]
}

/**
 * Set pixel at (x, y)
 */
export function setPixel(image: ImageData, x: number, y: number, color: Color): void {
	const idx = (y * image.width + x) * 4
	image.data[idx] = color[0]
	image.data[idx + 1] = color[1]
	image.data[idx + 2] = color[2]
	image.data[idx + 3] = color[3]
}

/**
 * Wrap ImageData as a raster placed at `origin`. The pixel buffer is shared, not copied.
 */
export function toRaster(image: ImageData, origin: Point = ORIGIN): Raster {
	const { width, height, data, premultiplied = false } = image
	const bounds: Rect = { x: origin.x, y: origin.y, width, height }
	const expand = premultiplied ? widen : premultiply

	return {
		width,
		height,
		data,
		premultiplied,
		bounds,
		at(x: number, y: number): Color64 {
			const rx = x - bounds.x
			const ry = y - bounds.y
			if (rx < 0 || rx >= width || ry < 0 || ry >= height) return TRANSPARENT
			return expand(getPixel(image, rx, ry))
		},
	}
}

/**
 * Create a transparent, premultiplied raster covering `bounds`
 */
export function createRaster(bounds: Rect): Raster {
	return toRaster({ ...createImageData(bounds.width, bounds.height), premultiplied: true }, bounds)
}

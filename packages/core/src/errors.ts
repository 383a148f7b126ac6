/**
 * Raised when bytes cannot be decoded into an image: unknown format or corrupt data
 */
export class DecodeError extends Error {
	override readonly name = 'DecodeError'

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
	}
}

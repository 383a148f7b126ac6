/**
 * @overmark/codecs - JPEG and PNG codecs
 */

export { DEFAULT_JPEG_QUALITY, JpegCodec, encodeJpeg, normalizeQuality } from './jpeg/codec'
export { PngCodec, encodePng } from './png/codec'
export { decodeImage, encodeImage, getCodec } from './image'

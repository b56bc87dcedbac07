/**
 * @layerkit/io
 *
 * Raster codecs and the file-system document service.
 *
 * @packageDocumentation
 */

// Codecs
export { encodePng, decodePng, PNG_SIGNATURE } from './png-codec';
export { encodeJpeg, decodeJpeg } from './jpeg-codec';
export { encodeBmp, decodeBmp } from './bmp-codec';
export { encodeImage, decodeImage, detectFormat, formatFromExtension, isUnencodableExtension } from './codecs';

// Document service
export { DocumentServiceImpl } from './document-service';
export type { DocumentServiceOptions } from './document-service';

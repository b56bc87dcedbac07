/**
 * @module codecs
 * Format dispatch for the raster codecs. Decoding picks the codec from the
 * file's magic bytes, never from its name.
 */

import type { Bitmap, ImageFormat } from '@layerkit/types';
import { decodeBmp, encodeBmp } from './bmp-codec';
import { decodeJpeg, encodeJpeg } from './jpeg-codec';
import { PNG_SIGNATURE, decodePng, encodePng } from './png-codec';

/** Image extensions the codecs cannot write. Saving to one needs an explicit format. */
const UNENCODABLE_EXTENSIONS: ReadonlySet<string> = new Set(['.gif', '.tif', '.tiff', '.webp']);

function extensionOf(filePath: string): string {
  const dot = filePath.lastIndexOf('.');
  return dot >= 0 ? filePath.slice(dot).toLowerCase() : '';
}

/** Map a path's extension to a format; unknown extensions map to PNG. */
export function formatFromExtension(filePath: string): ImageFormat {
  switch (extensionOf(filePath)) {
    case '.jpg':
    case '.jpeg':
      return 'jpeg';
    case '.bmp':
      return 'bmp';
    default:
      return 'png';
  }
}

/** True for paths naming an image format the codecs cannot encode (GIF, TIFF, WebP). */
export function isUnencodableExtension(filePath: string): boolean {
  return UNENCODABLE_EXTENSIONS.has(extensionOf(filePath));
}

/** Identify an encoded image by its leading bytes. */
export function detectFormat(bytes: Uint8Array): ImageFormat | null {
  if (bytes.length >= 8 && PNG_SIGNATURE.every((b, i) => bytes[i] === b)) return 'png';
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) return 'jpeg';
  if (bytes.length >= 2 && bytes[0] === 0x42 && bytes[1] === 0x4d) return 'bmp';
  return null;
}

/** Encode `bitmap`; `quality` only affects JPEG. */
export function encodeImage(bitmap: Bitmap, format: ImageFormat, quality: number): Uint8Array {
  switch (format) {
    case 'jpeg':
      return encodeJpeg(bitmap, quality);
    case 'bmp':
      return encodeBmp(bitmap);
    case 'png':
      return encodePng(bitmap);
  }
}

/**
 * Decode PNG, JPEG or BMP data.
 * @throws Error for an unrecognised or malformed file.
 */
export function decodeImage(bytes: Uint8Array): Bitmap {
  const format = detectFormat(bytes);
  switch (format) {
    case 'png':
      return decodePng(bytes);
    case 'jpeg':
      return decodeJpeg(bytes);
    case 'bmp':
      return decodeBmp(bytes);
    case null:
      throw new Error('Unrecognised image format');
  }
}

/**
 * @module bmp-codec
 * Windows BMP: writes 32-bit BGRA bottom-up with a BITMAPINFOHEADER;
 * reads uncompressed 24- and 32-bit files, bottom-up or top-down.
 */

import type { Bitmap } from '@layerkit/types';
import { bitmapFromData } from '@layerkit/core';

const FILE_HEADER_SIZE = 14;
const INFO_HEADER_SIZE = 40;
const BI_RGB = 0;
const BI_BITFIELDS = 3;

/** Encode as a 32-bit BMP, alpha kept in the fourth byte. */
export function encodeBmp(bitmap: Bitmap): Uint8Array {
  const { width, height, data } = bitmap;
  const pixelBytes = width * height * 4;
  const dataOffset = FILE_HEADER_SIZE + INFO_HEADER_SIZE;
  const out = new Uint8Array(dataOffset + pixelBytes);
  const view = new DataView(out.buffer);

  out[0] = 0x42; // B
  out[1] = 0x4d; // M
  view.setUint32(2, out.length, true);
  view.setUint32(10, dataOffset, true);

  view.setUint32(14, INFO_HEADER_SIZE, true);
  view.setInt32(18, width, true);
  view.setInt32(22, height, true); // positive: bottom-up
  view.setUint16(26, 1, true); // planes
  view.setUint16(28, 32, true);
  view.setUint32(30, BI_RGB, true);
  view.setUint32(34, pixelBytes, true);
  view.setInt32(38, 2835, true); // 72 DPI
  view.setInt32(42, 2835, true);

  for (let y = 0; y < height; y++) {
    const row = dataOffset + (height - 1 - y) * width * 4;
    for (let x = 0; x < width; x++) {
      const s = (y * width + x) * 4;
      const d = row + x * 4;
      out[d] = data[s + 2];
      out[d + 1] = data[s + 1];
      out[d + 2] = data[s];
      out[d + 3] = data[s + 3];
    }
  }
  return out;
}

/**
 * Decode an uncompressed 24/32-bit BMP. A 32-bit file whose alpha bytes
 * are all zero is treated as opaque.
 * @throws Error for anything else.
 */
export function decodeBmp(bytes: Uint8Array): Bitmap {
  if (bytes.length < FILE_HEADER_SIZE + INFO_HEADER_SIZE || bytes[0] !== 0x42 || bytes[1] !== 0x4d) {
    throw new Error('Invalid BMP header');
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const dataOffset = view.getUint32(10, true);
  const width = view.getInt32(18, true);
  const rawHeight = view.getInt32(22, true);
  const bitsPerPixel = view.getUint16(28, true);
  const compression = view.getUint32(30, true);

  if (bitsPerPixel !== 24 && bitsPerPixel !== 32) {
    throw new Error(`Unsupported BMP bit depth: ${bitsPerPixel}`);
  }
  if (compression !== BI_RGB && !(compression === BI_BITFIELDS && bitsPerPixel === 32)) {
    throw new Error(`Unsupported BMP compression: ${compression}`);
  }

  const topDown = rawHeight < 0;
  const height = Math.abs(rawHeight);
  const bytesPerPixel = bitsPerPixel / 8;
  const stride = Math.ceil((width * bytesPerPixel) / 4) * 4;
  if (width <= 0 || height === 0 || dataOffset + stride * height > bytes.length) {
    throw new Error('BMP pixel data is truncated');
  }

  const out = new Uint8ClampedArray(width * height * 4);
  let anyAlpha = false;
  for (let y = 0; y < height; y++) {
    const row = dataOffset + (topDown ? y : height - 1 - y) * stride;
    for (let x = 0; x < width; x++) {
      const s = row + x * bytesPerPixel;
      const d = (y * width + x) * 4;
      out[d] = bytes[s + 2];
      out[d + 1] = bytes[s + 1];
      out[d + 2] = bytes[s];
      const alpha = bytesPerPixel === 4 ? bytes[s + 3] : 255;
      if (alpha !== 0) anyAlpha = true;
      out[d + 3] = alpha;
    }
  }
  if (!anyAlpha) {
    for (let i = 3; i < out.length; i += 4) out[i] = 255;
  }
  return bitmapFromData(width, height, out);
}

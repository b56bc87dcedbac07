/**
 * @module jpeg-codec
 * Baseline JPEG via jpeg-js. JPEG carries no alpha, so translucent pixels
 * are composited onto white before encoding.
 */

import * as jpeg from 'jpeg-js';
import type { Bitmap } from '@layerkit/types';
import { bitmapFromData, clamp } from '@layerkit/core';

/** Encode `bitmap` at `quality` (clamped to 1..100). */
export function encodeJpeg(bitmap: Bitmap, quality: number): Uint8Array {
  const { width, height, data } = bitmap;
  const flattened = new Uint8Array(data.length);
  for (let i = 0; i < data.length; i += 4) {
    const a = data[i + 3] / 255;
    const white = 255 * (1 - a);
    flattened[i] = Math.round(data[i] * a + white);
    flattened[i + 1] = Math.round(data[i + 1] * a + white);
    flattened[i + 2] = Math.round(data[i + 2] * a + white);
    flattened[i + 3] = 255;
  }
  const encoded = jpeg.encode({ width, height, data: flattened }, clamp(Math.round(quality), 1, 100));
  return new Uint8Array(encoded.data);
}

/**
 * Decode a JPEG into an opaque bitmap.
 * @throws Error when the data is not a decodable JPEG.
 */
export function decodeJpeg(bytes: Uint8Array): Bitmap {
  const decoded = jpeg.decode(bytes, { useTArray: true, formatAsRGBA: true });
  return bitmapFromData(decoded.width, decoded.height, new Uint8ClampedArray(decoded.data));
}

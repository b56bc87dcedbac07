/**
 * @module bitmap
 * Pixel buffer primitives: allocation, copying, pixel access and
 * straight-alpha source-over compositing.
 *
 * All functions that return a {@link Bitmap} allocate a new buffer; only
 * `fillBitmap`, `setPixel`, `blendPixel` and `compositeOver` write into the
 * bitmap they are given.
 */

import type { Bitmap, Color } from '@layerkit/types';

/** RGBA bytes of one pixel. */
export type Rgba = [number, number, number, number];

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RangeError(`Invalid bitmap size ${width}x${height}`);
  }
}

/**
 * Allocate a fully transparent bitmap.
 * @throws RangeError for non-integer or non-positive dimensions.
 */
export function createBitmap(width: number, height: number): Bitmap {
  assertDimensions(width, height);
  return { width, height, data: new Uint8ClampedArray(width * height * 4) };
}

/**
 * Wrap existing RGBA bytes. The buffer is adopted, not copied.
 * @throws RangeError when `data.length` is not `width * height * 4`.
 */
export function bitmapFromData(width: number, height: number, data: Uint8ClampedArray): Bitmap {
  assertDimensions(width, height);
  if (data.length !== width * height * 4) {
    throw new RangeError(
      `Buffer length ${data.length} does not match ${width}x${height} RGBA (${width * height * 4})`,
    );
  }
  return { width, height, data };
}

/** Deep copy of a bitmap. */
export function cloneBitmap(source: Bitmap): Bitmap {
  return { width: source.width, height: source.height, data: new Uint8ClampedArray(source.data) };
}

/** Overwrite every pixel with `color` (no blending). */
export function fillBitmap(bitmap: Bitmap, color: Color): void {
  const { data } = bitmap;
  const a = Math.round(color.a * 255);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = color.r;
    data[i + 1] = color.g;
    data[i + 2] = color.b;
    data[i + 3] = a;
  }
}

/** Read one pixel, or `null` outside the bitmap. */
export function getPixel(bitmap: Bitmap, x: number, y: number): Rgba | null {
  if (x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) return null;
  const i = (y * bitmap.width + x) * 4;
  const d = bitmap.data;
  return [d[i], d[i + 1], d[i + 2], d[i + 3]];
}

/** Write one pixel as raw bytes. Out-of-bounds writes are ignored. */
export function setPixel(bitmap: Bitmap, x: number, y: number, rgba: Rgba): void {
  if (x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) return;
  const i = (y * bitmap.width + x) * 4;
  bitmap.data[i] = rgba[0];
  bitmap.data[i + 1] = rgba[1];
  bitmap.data[i + 2] = rgba[2];
  bitmap.data[i + 3] = rgba[3];
}

/**
 * Source-over blend of one color into the byte at `index`.
 * `srcAlpha` is the effective source alpha in 0..1.
 */
function blendAt(
  data: Uint8ClampedArray,
  index: number,
  r: number,
  g: number,
  b: number,
  srcAlpha: number,
): void {
  if (srcAlpha <= 0) return;
  if (srcAlpha >= 1) {
    data[index] = r;
    data[index + 1] = g;
    data[index + 2] = b;
    data[index + 3] = 255;
    return;
  }

  const dstAlpha = data[index + 3] / 255;
  const outAlpha = srcAlpha + dstAlpha * (1 - srcAlpha);
  if (outAlpha === 0) return;

  const dstWeight = dstAlpha * (1 - srcAlpha);
  data[index] = (r * srcAlpha + data[index] * dstWeight) / outAlpha;
  data[index + 1] = (g * srcAlpha + data[index + 1] * dstWeight) / outAlpha;
  data[index + 2] = (b * srcAlpha + data[index + 2] * dstWeight) / outAlpha;
  data[index + 3] = outAlpha * 255;
}

/**
 * Alpha-composite `color` onto one pixel. `coverage` (0..1) scales the
 * color's alpha. Out-of-bounds coordinates are ignored.
 */
export function blendPixel(bitmap: Bitmap, x: number, y: number, color: Color, coverage = 1): void {
  if (x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) return;
  blendAt(bitmap.data, (y * bitmap.width + x) * 4, color.r, color.g, color.b, color.a * coverage);
}

/**
 * Composite `src` over `dst` in place, scaling source alpha by `opacity`.
 * @throws RangeError if the bitmaps differ in size.
 */
export function compositeOver(dst: Bitmap, src: Bitmap, opacity = 1): void {
  if (dst.width !== src.width || dst.height !== src.height) {
    throw new RangeError(
      `Cannot composite ${src.width}x${src.height} onto ${dst.width}x${dst.height}`,
    );
  }
  if (opacity <= 0) return;

  const s = src.data;
  const d = dst.data;
  for (let i = 0; i < s.length; i += 4) {
    blendAt(d, i, s[i], s[i + 1], s[i + 2], (s[i + 3] / 255) * opacity);
  }
}

/** True when both bitmaps have the same size and identical bytes. */
export function bitmapsEqual(a: Bitmap, b: Bitmap): boolean {
  if (a.width !== b.width || a.height !== b.height) return false;
  const da = a.data;
  const db = b.data;
  for (let i = 0; i < da.length; i++) {
    if (da[i] !== db[i]) return false;
  }
  return true;
}

/** 32-bit FNV-1a hash of the dimensions and pixel bytes, as 8 hex digits. */
export function hashBitmap(bitmap: Bitmap): string {
  let hash = 0x811c9dc5;
  const mix = (byte: number): void => {
    hash ^= byte;
    hash = Math.imul(hash, 0x01000193);
  };
  for (const n of [bitmap.width, bitmap.height]) {
    mix(n & 0xff);
    mix((n >>> 8) & 0xff);
    mix((n >>> 16) & 0xff);
    mix((n >>> 24) & 0xff);
  }
  const { data } = bitmap;
  for (let i = 0; i < data.length; i++) {
    mix(data[i]);
  }
  return (hash >>> 0).toString(16).padStart(8, '0');
}

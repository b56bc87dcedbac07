/**
 * @module transform
 * Geometric bitmap transforms: rotate by quarter turns, flip, crop and
 * canvas resize. All functions create a new Bitmap and do NOT modify input.
 */

import type { Bitmap, Rect } from '@layerkit/types';
import { createBitmap } from './bitmap';

/** Lossless whole-image transforms offered by the editor. */
export type ImageTransform =
  | 'rotate-cw'
  | 'rotate-ccw'
  | 'rotate-180'
  | 'flip-horizontal'
  | 'flip-vertical';

function copyPixel(src: Uint8ClampedArray, srcIdx: number, dst: Uint8ClampedArray, dstIdx: number): void {
  dst[dstIdx] = src[srcIdx];
  dst[dstIdx + 1] = src[srcIdx + 1];
  dst[dstIdx + 2] = src[srcIdx + 2];
  dst[dstIdx + 3] = src[srcIdx + 3];
}

/**
 * Flip image horizontally (left-right).
 * @returns Flipped bitmap.
 */
export function flipHorizontal(bitmap: Bitmap): Bitmap {
  const { width, height, data: src } = bitmap;
  const out = createBitmap(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      copyPixel(src, (y * width + x) * 4, out.data, (y * width + (width - 1 - x)) * 4);
    }
  }
  return out;
}

/**
 * Flip image vertically (top-bottom).
 * @returns Flipped bitmap.
 */
export function flipVertical(bitmap: Bitmap): Bitmap {
  const { width, height, data: src } = bitmap;
  const out = createBitmap(width, height);
  const rowBytes = width * 4;
  for (let y = 0; y < height; y++) {
    const srcRow = y * rowBytes;
    out.data.set(src.subarray(srcRow, srcRow + rowBytes), (height - 1 - y) * rowBytes);
  }
  return out;
}

/**
 * Rotate image 90 degrees clockwise.
 * @returns Rotated bitmap (width/height swapped).
 */
export function rotate90CW(bitmap: Bitmap): Bitmap {
  const { width, height, data: src } = bitmap;
  const out = createBitmap(height, width);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      copyPixel(src, (y * width + x) * 4, out.data, (x * height + (height - 1 - y)) * 4);
    }
  }
  return out;
}

/**
 * Rotate image 90 degrees counter-clockwise.
 * @returns Rotated bitmap (width/height swapped).
 */
export function rotate90CCW(bitmap: Bitmap): Bitmap {
  const { width, height, data: src } = bitmap;
  const out = createBitmap(height, width);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      copyPixel(src, (y * width + x) * 4, out.data, ((width - 1 - x) * height + y) * 4);
    }
  }
  return out;
}

/**
 * Rotate image 180 degrees.
 * @returns Rotated bitmap.
 */
export function rotate180(bitmap: Bitmap): Bitmap {
  const { width, height, data: src } = bitmap;
  const out = createBitmap(width, height);
  const total = width * height;
  for (let i = 0; i < total; i++) {
    copyPixel(src, i * 4, out.data, (total - 1 - i) * 4);
  }
  return out;
}

/** Apply one of the named {@link ImageTransform}s. */
export function applyImageTransform(bitmap: Bitmap, transform: ImageTransform): Bitmap {
  switch (transform) {
    case 'rotate-cw':
      return rotate90CW(bitmap);
    case 'rotate-ccw':
      return rotate90CCW(bitmap);
    case 'rotate-180':
      return rotate180(bitmap);
    case 'flip-horizontal':
      return flipHorizontal(bitmap);
    case 'flip-vertical':
      return flipVertical(bitmap);
  }
}

/**
 * Crop image to a rectangular region. Parts of `rect` outside the source
 * come out transparent.
 * @throws RangeError if the rect has no area.
 */
export function cropBitmap(bitmap: Bitmap, rect: Rect): Bitmap {
  const { width, height, data: src } = bitmap;
  const { x, y, width: cropWidth, height: cropHeight } = rect;
  const out = createBitmap(cropWidth, cropHeight);

  const srcStartX = Math.max(0, x);
  const srcEndX = Math.min(width, x + cropWidth);
  const rowCopyWidth = srcEndX - srcStartX;
  if (rowCopyWidth <= 0) return out;

  for (let dy = 0; dy < cropHeight; dy++) {
    const srcY = y + dy;
    if (srcY < 0 || srcY >= height) continue;

    const srcRow = (srcY * width + srcStartX) * 4;
    const dstRow = (dy * cropWidth + (srcStartX - x)) * 4;
    out.data.set(src.subarray(srcRow, srcRow + rowCopyWidth * 4), dstRow);
  }
  return out;
}

/**
 * Resize the canvas (add/remove border) without scaling pixels.
 * @param anchorX - Horizontal anchor (0=left, 0.5=center, 1=right).
 * @param anchorY - Vertical anchor (0=top, 0.5=center, 1=bottom).
 */
export function canvasResize(
  bitmap: Bitmap,
  newWidth: number,
  newHeight: number,
  anchorX = 0,
  anchorY = 0,
): Bitmap {
  const { width, height, data: src } = bitmap;
  const out = createBitmap(newWidth, newHeight);
  const offsetX = Math.round((newWidth - width) * anchorX);
  const offsetY = Math.round((newHeight - height) * anchorY);

  for (let y = 0; y < height; y++) {
    const destY = y + offsetY;
    if (destY < 0 || destY >= newHeight) continue;
    for (let x = 0; x < width; x++) {
      const destX = x + offsetX;
      if (destX < 0 || destX >= newWidth) continue;
      copyPixel(src, (y * width + x) * 4, out.data, (destY * newWidth + destX) * 4);
    }
  }
  return out;
}

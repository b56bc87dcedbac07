/**
 * @module bitmap
 * Raw pixel buffer shared by layers, tools, codecs and the renderer.
 */

/**
 * 8-bit RGBA pixel buffer with straight (non-premultiplied) alpha.
 *
 * Row-major, 4 bytes per pixel, no row padding: the byte offset of pixel
 * (x, y) is `(y * width + x) * 4`. `data.length` is always
 * `width * height * 4`.
 */
export interface Bitmap {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;
}

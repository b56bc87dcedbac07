import { describe, expect, it } from 'vitest';
import type { Bitmap } from '@layerkit/types';
import { createBitmap, getPixel } from './bitmap';
import {
  applyImageTransform,
  canvasResize,
  cropBitmap,
  flipHorizontal,
  flipVertical,
  rotate180,
  rotate90CCW,
  rotate90CW,
} from './transform';

/** 3x2 bitmap whose red channel numbers the pixels 1..6 in row-major order. */
function numbered(width = 3, height = 2): Bitmap {
  const bmp = createBitmap(width, height);
  for (let i = 0; i < width * height; i++) {
    bmp.data[i * 4] = i + 1;
    bmp.data[i * 4 + 3] = 255;
  }
  return bmp;
}

function reds(bmp: Bitmap): number[] {
  const out: number[] = [];
  for (let i = 0; i < bmp.data.length; i += 4) out.push(bmp.data[i]);
  return out;
}

describe('quarter-turn rotation', () => {
  it('rotates clockwise and swaps dimensions', () => {
    const out = rotate90CW(numbered());
    expect([out.width, out.height]).toEqual([2, 3]);
    expect(reds(out)).toEqual([4, 1, 5, 2, 6, 3]);
  });

  it('rotates counter-clockwise', () => {
    const out = rotate90CCW(numbered());
    expect([out.width, out.height]).toEqual([2, 3]);
    expect(reds(out)).toEqual([3, 6, 2, 5, 1, 4]);
  });

  it('rotates 180 degrees', () => {
    expect(reds(rotate180(numbered()))).toEqual([6, 5, 4, 3, 2, 1]);
  });

  it('returns to the original after CW then CCW', () => {
    expect(reds(rotate90CCW(rotate90CW(numbered())))).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('does not modify the input', () => {
    const src = numbered();
    rotate90CW(src);
    expect(reds(src)).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

describe('flips', () => {
  it('flips horizontally', () => {
    expect(reds(flipHorizontal(numbered()))).toEqual([3, 2, 1, 6, 5, 4]);
  });

  it('flips vertically', () => {
    expect(reds(flipVertical(numbered()))).toEqual([4, 5, 6, 1, 2, 3]);
  });

  it('dispatches named transforms', () => {
    expect(reds(applyImageTransform(numbered(), 'flip-horizontal'))).toEqual([3, 2, 1, 6, 5, 4]);
    expect(applyImageTransform(numbered(), 'rotate-ccw').width).toBe(2);
  });
});

describe('cropBitmap', () => {
  it('extracts a sub-region', () => {
    const out = cropBitmap(numbered(), { x: 1, y: 0, width: 2, height: 2 });
    expect([out.width, out.height]).toEqual([2, 2]);
    expect(reds(out)).toEqual([2, 3, 5, 6]);
  });

  it('leaves parts outside the source transparent', () => {
    const out = cropBitmap(numbered(), { x: 2, y: 1, width: 2, height: 2 });
    expect(getPixel(out, 0, 0)).toEqual([6, 0, 0, 255]);
    expect(getPixel(out, 1, 0)).toEqual([0, 0, 0, 0]);
    expect(getPixel(out, 0, 1)).toEqual([0, 0, 0, 0]);
  });

  it('throws on an empty rect', () => {
    expect(() => cropBitmap(numbered(), { x: 0, y: 0, width: 0, height: 1 })).toThrow(RangeError);
  });
});

describe('canvasResize', () => {
  it('grows anchored top-left by default', () => {
    const out = canvasResize(numbered(), 4, 3);
    expect(getPixel(out, 0, 0)).toEqual([1, 0, 0, 255]);
    expect(getPixel(out, 2, 1)).toEqual([6, 0, 0, 255]);
    expect(getPixel(out, 3, 2)).toEqual([0, 0, 0, 0]);
  });

  it('shrinks with a centre anchor', () => {
    const out = canvasResize(numbered(), 1, 2, 0.5, 0);
    expect(reds(out)).toEqual([2, 5]);
  });
});

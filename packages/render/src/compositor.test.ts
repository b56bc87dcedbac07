import { describe, it, expect } from 'vitest';
import type { Bitmap, ViewportState } from '@layerkit/types';
import { createBitmap, fillBitmap, getPixel, setPixel } from '@layerkit/core';
import { renderFrame } from './compositor';

const FIT: ViewportState = { zoom: 1, isFitMode: true, panX: 0, panY: 0 };
const ACTUAL: ViewportState = { zoom: 1, isFitMode: false, panX: 0, panY: 0 };
const RED = { r: 255, g: 0, b: 0, a: 1 };

function gray(width: number, height: number): Bitmap {
  const bmp = createBitmap(width, height);
  fillBitmap(bmp, { r: 100, g: 100, b: 100, a: 1 });
  return bmp;
}

function quad(): Bitmap {
  const bmp = createBitmap(2, 2);
  setPixel(bmp, 0, 0, [10, 0, 0, 255]);
  setPixel(bmp, 1, 0, [20, 0, 0, 255]);
  setPixel(bmp, 0, 1, [30, 0, 0, 255]);
  setPixel(bmp, 1, 1, [40, 0, 0, 255]);
  return bmp;
}

describe('renderFrame', () => {
  describe('background', () => {
    it('should fill the frame when no image is loaded', () => {
      const { frame, transform } = renderFrame({ viewSize: { width: 4, height: 3 }, image: null, viewport: FIT });
      expect(frame.width).toBe(4);
      expect(frame.height).toBe(3);
      expect(getPixel(frame, 0, 0)).toEqual([30, 30, 30, 255]);
      expect(getPixel(frame, 3, 2)).toEqual([30, 30, 30, 255]);
      expect(transform).toBeNull();
    });

    it('should use a custom background', () => {
      const { frame } = renderFrame({
        viewSize: { width: 2, height: 2 },
        image: null,
        viewport: FIT,
        background: { r: 1, g: 2, b: 3, a: 1 },
      });
      expect(getPixel(frame, 1, 1)).toEqual([1, 2, 3, 255]);
    });
  });

  describe('image', () => {
    it('should scale the image up with nearest-neighbour sampling', () => {
      const { frame, transform } = renderFrame({ viewSize: { width: 4, height: 4 }, image: quad(), viewport: FIT });
      expect(transform?.scale).toBe(2);
      expect(getPixel(frame, 0, 0)).toEqual([10, 0, 0, 255]);
      expect(getPixel(frame, 1, 1)).toEqual([10, 0, 0, 255]);
      expect(getPixel(frame, 2, 1)).toEqual([20, 0, 0, 255]);
      expect(getPixel(frame, 1, 2)).toEqual([30, 0, 0, 255]);
      expect(getPixel(frame, 3, 3)).toEqual([40, 0, 0, 255]);
    });

    it('should centre the image at actual size', () => {
      const { frame } = renderFrame({ viewSize: { width: 4, height: 4 }, image: quad(), viewport: ACTUAL });
      expect(getPixel(frame, 0, 0)).toEqual([30, 30, 30, 255]);
      expect(getPixel(frame, 1, 1)).toEqual([10, 0, 0, 255]);
      expect(getPixel(frame, 2, 2)).toEqual([40, 0, 0, 255]);
      expect(getPixel(frame, 3, 3)).toEqual([30, 30, 30, 255]);
    });

    it('should apply the pan offset', () => {
      const { frame } = renderFrame({
        viewSize: { width: 4, height: 4 },
        image: quad(),
        viewport: { zoom: 1, isFitMode: false, panX: 1, panY: 1 },
      });
      expect(getPixel(frame, 1, 1)).toEqual([30, 30, 30, 255]);
      expect(getPixel(frame, 2, 2)).toEqual([10, 0, 0, 255]);
      expect(getPixel(frame, 3, 3)).toEqual([40, 0, 0, 255]);
    });

    it('should let the background show through transparent pixels', () => {
      const image = quad();
      setPixel(image, 0, 0, [0, 0, 0, 0]);
      const { frame } = renderFrame({ viewSize: { width: 2, height: 2 }, image, viewport: FIT });
      expect(getPixel(frame, 0, 0)).toEqual([30, 30, 30, 255]);
      expect(getPixel(frame, 1, 0)).toEqual([20, 0, 0, 255]);
    });

    it('should never modify the display bitmap', () => {
      const image = gray(10, 10);
      renderFrame({
        viewSize: { width: 10, height: 10 },
        image,
        viewport: FIT,
        crop: { region: { x: 2, y: 2, width: 5, height: 5 }, activeHandle: 'none', isDragging: false },
      });
      expect(getPixel(image, 0, 0)).toEqual([100, 100, 100, 255]);
    });
  });

  describe('crop overlay', () => {
    const crop = { region: { x: 10, y: 10, width: 20, height: 20 }, activeHandle: 'none' as const, isDragging: false };

    it('should dim outside the crop region', () => {
      const { frame } = renderFrame({ viewSize: { width: 40, height: 40 }, image: gray(40, 40), viewport: FIT, crop });
      expect(getPixel(frame, 0, 0)).toEqual([29, 29, 29, 255]);
      expect(getPixel(frame, 39, 39)).toEqual([29, 29, 29, 255]);
    });

    it('should leave the inside of the region untouched', () => {
      const { frame } = renderFrame({ viewSize: { width: 40, height: 40 }, image: gray(40, 40), viewport: FIT, crop });
      expect(getPixel(frame, 20, 20)).toEqual([100, 100, 100, 255]);
    });

    it('should draw the border, the thirds grid and the handles', () => {
      const { frame } = renderFrame({ viewSize: { width: 40, height: 40 }, image: gray(40, 40), viewport: FIT, crop });
      expect(getPixel(frame, 15, 9)).toEqual([255, 255, 255, 255]);
      expect(getPixel(frame, 16, 20)).toEqual([178, 178, 178, 255]);
      expect(getPixel(frame, 18, 7)).toEqual([255, 255, 255, 255]);
    });
  });

  describe('tool previews', () => {
    it('should draw the stroke in progress at screen scale', () => {
      const { frame } = renderFrame({
        viewSize: { width: 20, height: 20 },
        image: gray(10, 10),
        viewport: FIT,
        stroke: { points: [{ x: 2, y: 2 }], color: RED, size: 2, shape: 'square' },
      });
      expect(getPixel(frame, 2, 2)).toEqual([255, 0, 0, 255]);
      expect(getPixel(frame, 5, 5)).toEqual([255, 0, 0, 255]);
      expect(getPixel(frame, 6, 6)).toEqual([100, 100, 100, 255]);
      expect(getPixel(frame, 1, 1)).toEqual([100, 100, 100, 255]);
    });

    it('should draw the shape in progress at screen scale', () => {
      const { frame } = renderFrame({
        viewSize: { width: 20, height: 20 },
        image: gray(10, 10),
        viewport: FIT,
        shape: {
          type: 'rectangle',
          start: { x: 1, y: 1 },
          end: { x: 3, y: 3 },
          fillMode: 'fill',
          strokeColor: RED,
          fillColor: RED,
          strokeWidth: 1,
        },
      });
      expect(getPixel(frame, 2, 2)).toEqual([255, 0, 0, 255]);
      expect(getPixel(frame, 5, 5)).toEqual([255, 0, 0, 255]);
      expect(getPixel(frame, 6, 6)).toEqual([100, 100, 100, 255]);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { deflateSync } from 'fflate';
import { createBitmap, getPixel, setPixel } from '@layerkit/core';
import { PNG_SIGNATURE, decodePng, encodePng } from './png-codec';

/** Assemble a PNG from raw filtered scanlines. CRCs are left at zero. */
function buildPng(width: number, height: number, colorType: number, scanlines: number[], bitDepth = 8): Uint8Array {
  const idat = deflateSync(new Uint8Array(scanlines));
  const chunk = (type: string, data: Uint8Array): number[] => {
    const len = data.length;
    return [
      (len >>> 24) & 0xff,
      (len >>> 16) & 0xff,
      (len >>> 8) & 0xff,
      len & 0xff,
      ...Array.from(type, (ch) => ch.charCodeAt(0)),
      ...data,
      0,
      0,
      0,
      0,
    ];
  };
  const ihdr = new Uint8Array([0, 0, 0, width, 0, 0, 0, height, bitDepth, colorType, 0, 0, 0]);
  return new Uint8Array([
    ...PNG_SIGNATURE,
    ...chunk('IHDR', ihdr),
    ...chunk('IDAT', idat),
    ...chunk('IEND', new Uint8Array(0)),
  ]);
}

describe('png-codec', () => {
  describe('encodePng', () => {
    it('should write the signature and the image size', () => {
      const png = encodePng(createBitmap(3, 2));
      expect(Array.from(png.subarray(0, 8))).toEqual(Array.from(PNG_SIGNATURE));
      expect(String.fromCharCode(png[12], png[13], png[14], png[15])).toBe('IHDR');
      expect(png[19]).toBe(3);
      expect(png[23]).toBe(2);
      expect(png[24]).toBe(8);
      expect(png[25]).toBe(6);
    });

    it('should produce a file that decodes to the same pixels', () => {
      const bmp = createBitmap(2, 2);
      setPixel(bmp, 0, 0, [255, 0, 0, 255]);
      setPixel(bmp, 1, 1, [0, 0, 255, 128]);

      const decoded = decodePng(encodePng(bmp));
      expect(decoded.width).toBe(2);
      expect(decoded.height).toBe(2);
      expect(getPixel(decoded, 0, 0)).toEqual([255, 0, 0, 255]);
      expect(getPixel(decoded, 1, 0)).toEqual([0, 0, 0, 0]);
      expect(getPixel(decoded, 1, 1)).toEqual([0, 0, 255, 128]);
    });
  });

  describe('decodePng', () => {
    it('should expand RGB and reverse the Sub filter', () => {
      const png = buildPng(2, 1, 2, [1, 10, 20, 30, 5, 5, 5]);
      const bmp = decodePng(png);
      expect(getPixel(bmp, 0, 0)).toEqual([10, 20, 30, 255]);
      expect(getPixel(bmp, 1, 0)).toEqual([15, 25, 35, 255]);
    });

    it('should reverse the Up filter on grayscale', () => {
      const bmp = decodePng(buildPng(1, 2, 0, [0, 50, 2, 10]));
      expect(getPixel(bmp, 0, 0)).toEqual([50, 50, 50, 255]);
      expect(getPixel(bmp, 0, 1)).toEqual([60, 60, 60, 255]);
    });

    it('should keep grayscale alpha', () => {
      const bmp = decodePng(buildPng(1, 1, 4, [0, 77, 128]));
      expect(getPixel(bmp, 0, 0)).toEqual([77, 77, 77, 128]);
    });

    it('should reject a bad signature', () => {
      expect(() => decodePng(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]))).toThrow('Invalid PNG signature');
    });

    it('should reject 16-bit images', () => {
      expect(() => decodePng(buildPng(1, 1, 6, [0, 0, 0, 0, 0, 0, 0, 0, 0], 16))).toThrow(
        'Unsupported PNG format',
      );
    });

    it('should reject truncated image data', () => {
      expect(() => decodePng(buildPng(2, 2, 6, [0, 1, 2, 3]))).toThrow('truncated');
    });
  });
});

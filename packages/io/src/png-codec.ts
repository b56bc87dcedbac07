/**
 * @module png-codec
 * PNG encoder/decoder using fflate for deflate/inflate.
 * Pure JS, no browser or native image APIs.
 *
 * Encoding always writes 8-bit RGBA with filter 0. Decoding accepts 8-bit
 * grayscale, grayscale+alpha, RGB and RGBA, non-interlaced, with any of the
 * five scanline filters.
 */

import { deflateSync, inflateSync } from 'fflate';
import type { Bitmap } from '@layerkit/types';
import { bitmapFromData } from '@layerkit/core';

// ── CRC32 lookup table (256 entries) ──

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

// ── Helpers ──

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

function read32(buf: Uint8Array, offset: number): number {
  return (
    ((buf[offset] << 24) | (buf[offset + 1] << 16) | (buf[offset + 2] << 8) | buf[offset + 3]) >>>
    0
  );
}

/** PNG signature: 8 bytes. */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/** Channels per pixel for each supported 8-bit colour type. */
const CHANNELS: Readonly<Record<number, number>> = { 0: 1, 2: 3, 4: 2, 6: 4 };

/** Append one chunk (length, type, data, CRC) at `offset`; returns the new offset. */
function writeChunk(out: Uint8Array, offset: number, type: string, data: Uint8Array): number {
  write32(out, offset, data.length);
  const typeStart = offset + 4;
  for (let i = 0; i < 4; i++) out[typeStart + i] = type.charCodeAt(i);
  out.set(data, typeStart + 4);
  const end = typeStart + 4 + data.length;
  write32(out, end, crc32(out, typeStart, end));
  return end + 4;
}

/** Encode a bitmap as an 8-bit RGBA PNG. */
export function encodePng(bitmap: Bitmap): Uint8Array {
  const { data, width, height } = bitmap;

  const rowBytes = width * 4;
  const rawData = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    rawData[y * (1 + rowBytes)] = 0; // filter: None
    rawData.set(data.subarray(y * rowBytes, (y + 1) * rowBytes), y * (1 + rowBytes) + 1);
  }
  const compressed = deflateSync(rawData);

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = 6; // color type: RGBA

  const out = new Uint8Array(8 + (12 + ihdr.length) + (12 + compressed.length) + 12);
  out.set(PNG_SIGNATURE, 0);
  let offset = writeChunk(out, 8, 'IHDR', ihdr);
  offset = writeChunk(out, offset, 'IDAT', compressed);
  writeChunk(out, offset, 'IEND', new Uint8Array(0));
  return out;
}

/**
 * Decode a PNG file into a bitmap.
 * @throws Error for a bad signature, a missing header or an unsupported format.
 */
export function decodePng(png: Uint8Array): Bitmap {
  for (let i = 0; i < 8; i++) {
    if (png[i] !== PNG_SIGNATURE[i]) {
      throw new Error('Invalid PNG signature');
    }
  }

  let width = 0;
  let height = 0;
  let channels = 0;
  const idatChunks: Uint8Array[] = [];

  let offset = 8;
  while (offset + 8 <= png.length) {
    const length = read32(png, offset);
    offset += 4;
    const typeStr = String.fromCharCode(png[offset], png[offset + 1], png[offset + 2], png[offset + 3]);
    offset += 4;

    if (typeStr === 'IHDR') {
      width = read32(png, offset);
      height = read32(png, offset + 4);
      const bitDepth = png[offset + 8];
      const colorType = png[offset + 9];
      const interlace = png[offset + 12];
      channels = CHANNELS[colorType] ?? 0;
      if (bitDepth !== 8 || channels === 0 || interlace !== 0) {
        throw new Error(
          `Unsupported PNG format: bitDepth=${bitDepth}, colorType=${colorType}, interlace=${interlace}`,
        );
      }
    } else if (typeStr === 'IDAT') {
      idatChunks.push(png.subarray(offset, offset + length));
    } else if (typeStr === 'IEND') {
      break;
    }

    offset += length + 4; // skip data + CRC
  }

  if (width === 0 || height === 0) {
    throw new Error('PNG missing IHDR chunk');
  }

  let totalLen = 0;
  for (const chunk of idatChunks) totalLen += chunk.length;
  const combined = new Uint8Array(totalLen);
  let pos = 0;
  for (const chunk of idatChunks) {
    combined.set(chunk, pos);
    pos += chunk.length;
  }

  const rawData = inflateSync(combined);
  const rowBytes = width * channels;
  if (rawData.length < height * (1 + rowBytes)) {
    throw new Error('PNG image data is truncated');
  }
  const pixels = unfilter(rawData, width, height, channels);
  return bitmapFromData(width, height, expandToRgba(pixels, width * height, channels));
}

/** Reverse the per-scanline filters into packed samples. */
function unfilter(rawData: Uint8Array, width: number, height: number, bpp: number): Uint8Array {
  const rowBytes = width * bpp;
  const data = new Uint8Array(height * rowBytes);

  for (let y = 0; y < height; y++) {
    const filterType = rawData[y * (1 + rowBytes)];
    const scanlineOffset = y * (1 + rowBytes) + 1;
    const outOffset = y * rowBytes;

    for (let x = 0; x < rowBytes; x++) {
      const raw = rawData[scanlineOffset + x];
      const a = x >= bpp ? data[outOffset + x - bpp] : 0; // left
      const b = y > 0 ? data[outOffset - rowBytes + x] : 0; // above
      const c = x >= bpp && y > 0 ? data[outOffset - rowBytes + x - bpp] : 0; // above-left

      let reconstructed: number;
      switch (filterType) {
        case 0:
          reconstructed = raw;
          break;
        case 1:
          reconstructed = (raw + a) & 0xff;
          break;
        case 2:
          reconstructed = (raw + b) & 0xff;
          break;
        case 3:
          reconstructed = (raw + ((a + b) >> 1)) & 0xff;
          break;
        case 4:
          reconstructed = (raw + paethPredictor(a, b, c)) & 0xff;
          break;
        default:
          throw new Error(`Unsupported PNG filter type: ${filterType}`);
      }
      data[outOffset + x] = reconstructed;
    }
  }
  return data;
}

function expandToRgba(samples: Uint8Array, pixelCount: number, channels: number): Uint8ClampedArray {
  const out = new Uint8ClampedArray(pixelCount * 4);
  for (let p = 0; p < pixelCount; p++) {
    const s = p * channels;
    const d = p * 4;
    switch (channels) {
      case 1:
        out[d] = out[d + 1] = out[d + 2] = samples[s];
        out[d + 3] = 255;
        break;
      case 2:
        out[d] = out[d + 1] = out[d + 2] = samples[s];
        out[d + 3] = samples[s + 1];
        break;
      case 3:
        out[d] = samples[s];
        out[d + 1] = samples[s + 1];
        out[d + 2] = samples[s + 2];
        out[d + 3] = 255;
        break;
      default:
        out[d] = samples[s];
        out[d + 1] = samples[s + 1];
        out[d + 2] = samples[s + 2];
        out[d + 3] = samples[s + 3];
    }
  }
  return out;
}

/** Paeth predictor used by PNG filter type 4. */
function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

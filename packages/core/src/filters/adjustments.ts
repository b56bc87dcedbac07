/**
 * @module filters/adjustments
 * Color adjustments: brightness/contrast and color balance.
 * All functions create a new Bitmap and do NOT modify the input.
 * Alpha is carried over unchanged.
 */

import type {
  AdjustmentSettings,
  Bitmap,
  BrightnessContrastSettings,
  ColorBalanceSettings,
  ToneBalance,
} from '@layerkit/types';
import { createBitmap } from '../bitmap';

const LUMA_R = 0.2126;
const LUMA_G = 0.7152;
const LUMA_B = 0.0722;

/** Clamp an offset to the -100..100 slider range. */
function clampOffset(v: number): number {
  return v < -100 ? -100 : v > 100 ? 100 : v;
}

/** 0..1 channel value to a byte, truncating. */
function toByte(v: number): number {
  const n = Math.trunc(v * 255);
  return n < 0 ? 0 : n > 255 ? 255 : n;
}

function clamp01(v: number): number {
  return v < 0 ? 0 : v > 1 ? 1 : v;
}

export const NEUTRAL_TONE: ToneBalance = Object.freeze({ cyanRed: 0, magentaGreen: 0, yellowBlue: 0 });

/** Color balance with every offset at zero. */
export function neutralColorBalance(preserveLuminosity = true): ColorBalanceSettings {
  return {
    shadows: NEUTRAL_TONE,
    midtones: NEUTRAL_TONE,
    highlights: NEUTRAL_TONE,
    preserveLuminosity,
  };
}

export function isBrightnessContrastNoOp(settings: BrightnessContrastSettings): boolean {
  return settings.brightness === 0 && settings.contrast === 0;
}

function isToneNeutral(tone: ToneBalance): boolean {
  return tone.cyanRed === 0 && tone.magentaGreen === 0 && tone.yellowBlue === 0;
}

/** True when all nine offsets are zero. Luminosity preservation alone changes nothing. */
export function isColorBalanceNoOp(settings: ColorBalanceSettings): boolean {
  return isToneNeutral(settings.shadows) && isToneNeutral(settings.midtones) && isToneNeutral(settings.highlights);
}

export function isAdjustmentNoOp(adjustment: AdjustmentSettings): boolean {
  return adjustment.kind === 'brightness-contrast'
    ? isBrightnessContrastNoOp(adjustment.settings)
    : isColorBalanceNoOp(adjustment.settings);
}

/**
 * Brightness is added to each channel (±100 maps to ±1.0), then contrast
 * scales around mid-gray by `(contrast + 100) / 100`.
 */
export function applyBrightnessContrast(source: Bitmap, settings: BrightnessContrastSettings): Bitmap {
  const result = createBitmap(source.width, source.height);
  const s = source.data;
  const d = result.data;
  const brightness = clampOffset(settings.brightness) / 100;
  const contrast = (clampOffset(settings.contrast) + 100) / 100;

  for (let i = 0; i < s.length; i += 4) {
    for (let c = 0; c < 3; c++) {
      const v = s[i + c] / 255 + brightness;
      d[i + c] = toByte((v - 0.5) * contrast + 0.5);
    }
    d[i + 3] = s[i + 3];
  }
  return result;
}

/**
 * Shifts each pixel toward red/green/blue (positive offsets) or
 * cyan/magenta/yellow (negative) with the shadow, midtone and highlight
 * offsets weighted by the pixel's luminance. With `preserveLuminosity`
 * the result is rescaled to the original luminance.
 */
export function applyColorBalance(source: Bitmap, settings: ColorBalanceSettings): Bitmap {
  const result = createBitmap(source.width, source.height);
  const s = source.data;
  const d = result.data;
  const { shadows, midtones, highlights } = settings;

  const sCR = clampOffset(shadows.cyanRed) / 100;
  const sMG = clampOffset(shadows.magentaGreen) / 100;
  const sYB = clampOffset(shadows.yellowBlue) / 100;
  const mCR = clampOffset(midtones.cyanRed) / 100;
  const mMG = clampOffset(midtones.magentaGreen) / 100;
  const mYB = clampOffset(midtones.yellowBlue) / 100;
  const hCR = clampOffset(highlights.cyanRed) / 100;
  const hMG = clampOffset(highlights.magentaGreen) / 100;
  const hYB = clampOffset(highlights.yellowBlue) / 100;

  for (let i = 0; i < s.length; i += 4) {
    let r = s[i] / 255;
    let g = s[i + 1] / 255;
    let b = s[i + 2] / 255;

    const lum = LUMA_R * r + LUMA_G * g + LUMA_B * b;
    const shadowW = 1 - clamp01(lum * 2);
    const highlightW = clamp01((lum - 0.5) * 2);
    const midW = 1 - shadowW - highlightW;

    const rAdj = sCR * shadowW + mCR * midW + hCR * highlightW;
    const gAdj = sMG * shadowW + mMG * midW + hMG * highlightW;
    const bAdj = sYB * shadowW + mYB * midW + hYB * highlightW;

    r += rAdj * 0.5;
    g += gAdj * 0.5 - rAdj * 0.15;
    b += bAdj * 0.5 - rAdj * 0.15;

    // Toward yellow lifts red and green; toward magenta lifts red and blue.
    if (bAdj < 0) {
      r -= bAdj * 0.3;
      g -= bAdj * 0.3;
    }
    if (gAdj < 0) {
      r -= gAdj * 0.3;
      b -= gAdj * 0.3;
    }

    if (settings.preserveLuminosity) {
      const newLum = LUMA_R * r + LUMA_G * g + LUMA_B * b;
      if (newLum > 0.001) {
        const scale = lum / newLum;
        r *= scale;
        g *= scale;
        b *= scale;
      }
    }

    d[i] = toByte(r);
    d[i + 1] = toByte(g);
    d[i + 2] = toByte(b);
    d[i + 3] = s[i + 3];
  }
  return result;
}

/** Apply whichever adjustment `adjustment` describes. */
export function applyAdjustment(source: Bitmap, adjustment: AdjustmentSettings): Bitmap {
  return adjustment.kind === 'brightness-contrast'
    ? applyBrightnessContrast(source, adjustment.settings)
    : applyColorBalance(source, adjustment.settings);
}

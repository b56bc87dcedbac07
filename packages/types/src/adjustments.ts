/**
 * @module adjustments
 * Immutable settings for the color adjustments. All offsets are in the
 * range -100..+100 with 0 meaning "no change".
 */

/** Brightness / contrast offsets. */
export interface BrightnessContrastSettings {
  readonly brightness: number;
  readonly contrast: number;
}

/** Offsets for one tonal range. */
export interface ToneBalance {
  /** Cyan (-100) to Red (+100). */
  readonly cyanRed: number;
  /** Magenta (-100) to Green (+100). */
  readonly magentaGreen: number;
  /** Yellow (-100) to Blue (+100). */
  readonly yellowBlue: number;
}

/** Color balance per tonal range. */
export interface ColorBalanceSettings {
  readonly shadows: ToneBalance;
  readonly midtones: ToneBalance;
  readonly highlights: ToneBalance;
  /** Rescale each pixel so its luminance is unchanged. */
  readonly preserveLuminosity: boolean;
}

/** Adjustment held in the preview slot. */
export type AdjustmentSettings =
  | { kind: 'brightness-contrast'; settings: BrightnessContrastSettings }
  | { kind: 'color-balance'; settings: ColorBalanceSettings };

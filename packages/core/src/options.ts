/**
 * @module options
 * Editor configuration. Hosts pass a partial object which is merged over
 * {@link DEFAULT_EDITOR_OPTIONS}; there are no config files or env vars.
 */

import type { BrushSettings, ShapeSettings } from '@layerkit/types';

/** Tunable limits and defaults for the editor. */
export interface EditorOptions {
  /** Smallest allowed zoom factor. */
  minZoom: number;
  /** Largest allowed zoom factor. */
  maxZoom: number;
  /** Zoom delta applied by one zoom-in / zoom-out step. */
  zoomStep: number;
  /** Crop handle hit radius in screen pixels. */
  cropHandleRadius: number;
  /** Minimum crop size as a fraction of each image side. */
  cropMinSizeRatio: number;
  defaultBrush: BrushSettings;
  defaultShape: ShapeSettings;
  /** Shape drags shorter than this on both axes are discarded. */
  minShapeDrag: number;
  /** Infix used by unique file names, e.g. `photo_edited_001.png`. */
  uniqueNameSuffix: string;
  /** Upper bound on unique-name probes. */
  uniqueNameMaxAttempts: number;
  /** JPEG quality used when the caller gives none. */
  jpegQuality: number;
}

export const DEFAULT_EDITOR_OPTIONS: Readonly<EditorOptions> = Object.freeze<EditorOptions>({
  minZoom: 0.1,
  maxZoom: 10,
  zoomStep: 0.1,
  cropHandleRadius: 12,
  cropMinSizeRatio: 0.02,
  defaultBrush: { color: { r: 255, g: 255, b: 255, a: 1 }, size: 10, shape: 'round' },
  defaultShape: {
    type: 'rectangle',
    fillMode: 'stroke',
    strokeColor: { r: 255, g: 255, b: 255, a: 1 },
    fillColor: { r: 255, g: 255, b: 255, a: 1 },
    strokeWidth: 3,
  },
  minShapeDrag: 3,
  uniqueNameSuffix: '_edited_',
  uniqueNameMaxAttempts: 999,
  jpegQuality: 95,
});

/**
 * Merge `overrides` over the defaults.
 * @throws RangeError if the zoom bounds are inverted or non-positive.
 */
export function resolveEditorOptions(overrides: Partial<EditorOptions> = {}): EditorOptions {
  const merged: EditorOptions = {
    ...DEFAULT_EDITOR_OPTIONS,
    ...overrides,
    defaultBrush: { ...DEFAULT_EDITOR_OPTIONS.defaultBrush, ...overrides.defaultBrush },
    defaultShape: { ...DEFAULT_EDITOR_OPTIONS.defaultShape, ...overrides.defaultShape },
  };
  if (merged.minZoom <= 0 || merged.maxZoom < merged.minZoom) {
    throw new RangeError(`Invalid zoom bounds [${merged.minZoom}, ${merged.maxZoom}]`);
  }
  return merged;
}

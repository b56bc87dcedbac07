/**
 * @module editor-store
 * Zustand (vanilla) store for UI-side editor state: tool settings, slider
 * values, view size and status line.
 *
 * The store holds what panels and toolbars bind to. Pixels, layers and the
 * viewport live in the editor core; {@link EditorSession} mirrors the bits
 * the UI needs back into here.
 *
 * @see https://github.com/pmndrs/zustand
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type {
  BrightnessContrastSettings,
  BrushSettings,
  ColorBalanceSettings,
  CursorKind,
  ShapeSettings,
  ShapeType,
  Size,
  ToneBalance,
  ViewportState,
} from '@layerkit/types';
import { DEFAULT_EDITOR_OPTIONS, clamp, neutralColorBalance } from '@layerkit/core';
import type { EditorOptions } from '@layerkit/core';

/** Tonal range addressed by a color-balance slider. */
export type ToneRange = 'shadows' | 'midtones' | 'highlights';

export const NEUTRAL_BRIGHTNESS_CONTRAST: Readonly<BrightnessContrastSettings> = Object.freeze({
  brightness: 0,
  contrast: 0,
});

export interface EditorStoreState {
  brush: BrushSettings;
  shape: ShapeSettings;
  /** `freehand` for the brush, otherwise the parametric shape type. */
  drawingMode: ShapeType;
  brightnessContrast: BrightnessContrastSettings;
  colorBalance: ColorBalanceSettings;
  viewSize: Size;
  viewport: ViewportState;
  activeTool: string | null;
  isDirty: boolean;
  cursor: CursorKind;
  statusMessage: string;
}

export interface EditorStoreActions {
  setBrush: (changes: Partial<BrushSettings>) => void;
  setShape: (changes: Partial<ShapeSettings>) => void;
  /** A parametric mode also becomes the shape type. */
  setDrawingMode: (mode: ShapeType) => void;
  /** Slider values are clamped to -100..100. */
  setBrightness: (value: number) => void;
  setContrast: (value: number) => void;
  setToneBalance: (range: ToneRange, channel: keyof ToneBalance, value: number) => void;
  setPreserveLuminosity: (preserve: boolean) => void;
  /** Put every adjustment slider back to neutral. */
  resetAdjustments: () => void;
  setViewSize: (size: Size) => void;
  setViewport: (viewport: ViewportState) => void;
  setActiveTool: (toolId: string | null) => void;
  setDirty: (isDirty: boolean) => void;
  setCursor: (cursor: CursorKind) => void;
  setStatusMessage: (message: string) => void;
}

export type EditorStore = StoreApi<EditorStoreState & EditorStoreActions>;

function clampOffset(value: number): number {
  return clamp(Math.round(value), -100, 100);
}

/** Create a store seeded from the editor options. */
export function createEditorStore(
  options: Pick<EditorOptions, 'defaultBrush' | 'defaultShape'> = DEFAULT_EDITOR_OPTIONS,
): EditorStore {
  return createStore<EditorStoreState & EditorStoreActions>((set) => ({
    brush: { ...options.defaultBrush, color: { ...options.defaultBrush.color } },
    shape: {
      ...options.defaultShape,
      strokeColor: { ...options.defaultShape.strokeColor },
      fillColor: { ...options.defaultShape.fillColor },
    },
    drawingMode: 'freehand',
    brightnessContrast: { ...NEUTRAL_BRIGHTNESS_CONTRAST },
    colorBalance: neutralColorBalance(),
    viewSize: { width: 800, height: 600 },
    viewport: { zoom: 1, isFitMode: true, panX: 0, panY: 0 },
    activeTool: null,
    isDirty: false,
    cursor: 'default',
    statusMessage: 'Ready',

    setBrush: (changes): void =>
      set((state) => ({ brush: { ...state.brush, ...changes, size: Math.max(1, changes.size ?? state.brush.size) } })),
    setShape: (changes): void =>
      set((state) => ({
        shape: { ...state.shape, ...changes, strokeWidth: Math.max(1, changes.strokeWidth ?? state.shape.strokeWidth) },
      })),
    setDrawingMode: (mode): void =>
      set((state) =>
        mode === 'freehand' ? { drawingMode: mode } : { drawingMode: mode, shape: { ...state.shape, type: mode } },
      ),
    setBrightness: (value): void =>
      set((state) => ({ brightnessContrast: { ...state.brightnessContrast, brightness: clampOffset(value) } })),
    setContrast: (value): void =>
      set((state) => ({ brightnessContrast: { ...state.brightnessContrast, contrast: clampOffset(value) } })),
    setToneBalance: (range, channel, value): void =>
      set((state) => ({
        colorBalance: {
          ...state.colorBalance,
          [range]: { ...state.colorBalance[range], [channel]: clampOffset(value) },
        },
      })),
    setPreserveLuminosity: (preserve): void =>
      set((state) => ({ colorBalance: { ...state.colorBalance, preserveLuminosity: preserve } })),
    resetAdjustments: (): void =>
      set((state) => ({
        brightnessContrast: { ...NEUTRAL_BRIGHTNESS_CONTRAST },
        colorBalance: neutralColorBalance(state.colorBalance.preserveLuminosity),
      })),
    setViewSize: (size): void =>
      set({ viewSize: { width: Math.max(1, Math.floor(size.width)), height: Math.max(1, Math.floor(size.height)) } }),
    setViewport: (viewport): void => set({ viewport: { ...viewport } }),
    setActiveTool: (toolId): void => set({ activeTool: toolId }),
    setDirty: (isDirty): void => set({ isDirty }),
    setCursor: (cursor): void => set({ cursor }),
    setStatusMessage: (message): void => set({ statusMessage: message }),
  }));
}

/**
 * @module editor-core
 * The editing session for one image.
 *
 * Holds the original and working bitmaps (or delegates to the layer
 * manager's active layer while layer mode is on), the adjustment preview
 * slot and the three interactive tools. Pointer input arrives in image
 * coordinates and is routed to whichever tool the {@link ToolManager} has
 * active.
 *
 * Bitmaps returned from `getDisplayBitmap` / `getCompositeBitmap` may be
 * borrowed from the editor; callers must not mutate them.
 *
 * Events: `image:loaded` after a load, `image:changed` whenever the
 * displayed frame needs a redraw, `document:dirty` when the unsaved-changes
 * flag flips.
 */

import type {
  AdjustmentSettings,
  Bitmap,
  BrightnessContrastSettings,
  ColorBalanceSettings,
  CursorKind,
  DrawingStroke,
  Layer,
  Modifiers,
  Point,
  Rect,
  ShapeDescriptor,
  ShapeType,
} from '@layerkit/types';
import { cloneBitmap } from './bitmap';
import type { EditorServices } from './editor-services';
import { applyAdjustment, isAdjustmentNoOp } from './filters/adjustments';
import { clamp } from './geometry';
import { rasterizeShape, rasterizeStroke } from './raster';
import { ToolIds } from './tool-manager';
import { CropTool, cursorForHandle } from './tools/crop-tool';
import { DrawingTool } from './tools/drawing-tool';
import { ShapeTool } from './tools/shape-tool';
import { applyImageTransform, cropBitmap } from './transform';
import type { ImageTransform } from './transform';

/**
 * Pending adjustment. The frame is derived from whatever the edit target is
 * at display time and cached against the pixels it was computed from.
 */
interface PreviewSlot {
  readonly adjustment: AdjustmentSettings;
  cache: { readonly source: Bitmap; readonly frame: Bitmap } | null;
}

/** Bitmap that edits land in, and its layer while layer mode is on. */
interface EditTarget {
  readonly bitmap: Bitmap;
  readonly layer: Layer | null;
}

const NO_MODIFIERS: Modifiers = { shift: false };

export class ImageEditorCore {
  readonly cropTool: CropTool;
  readonly drawingTool: DrawingTool;
  readonly shapeTool: ShapeTool;

  private original: Bitmap | null = null;
  private working: Bitmap | null = null;
  private preview: PreviewSlot | null = null;
  private path: string | null = null;
  private dirty = false;
  private _drawingMode: ShapeType = 'freehand';
  private readonly unsubscribers: Array<() => void> = [];

  constructor(private readonly services: EditorServices) {
    const { bus, options, tools } = services;
    this.cropTool = new CropTool({
      handleRadius: options.cropHandleRadius,
      minSizeRatio: options.cropMinSizeRatio,
    });
    this.drawingTool = new DrawingTool(bus, options.defaultBrush);
    this.shapeTool = new ShapeTool(bus, options.defaultShape, options.minShapeDrag);

    tools.registerDeactivationCallback(ToolIds.Crop, () => this.cropTool.clearRegion());
    tools.registerDeactivationCallback(ToolIds.Drawing, () => {
      this.drawingTool.cancel();
      this.shapeTool.cancel();
    });
    tools.registerDeactivationCallback(ToolIds.BrightnessContrast, () => this.clearPreview());
    tools.registerDeactivationCallback(ToolIds.ColorBalance, () => this.clearPreview());

    // Pixels edited in place keep their buffer, so the cached frame goes too.
    this.unsubscribers.push(
      bus.on('layer:content-changed', () => {
        if (this.preview) this.preview.cache = null;
      }),
    );
  }

  get width(): number {
    return this.services.layers.isLayerMode ? this.services.layers.width : (this.working?.width ?? 0);
  }

  get height(): number {
    return this.services.layers.isLayerMode ? this.services.layers.height : (this.working?.height ?? 0);
  }

  get hasImage(): boolean {
    return this.services.layers.isLayerMode || this.working !== null;
  }

  get currentPath(): string | null {
    return this.path;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get isPreviewActive(): boolean {
    return this.preview !== null;
  }

  get previewAdjustment(): AdjustmentSettings | null {
    return this.preview?.adjustment ?? null;
  }

  /** `freehand` routes drawing input to the brush, anything else to the shape tool. */
  get drawingMode(): ShapeType {
    return this._drawingMode;
  }

  setDrawingMode(mode: ShapeType): void {
    if (mode === this._drawingMode) return;
    this.drawingTool.cancel();
    this.shapeTool.cancel();
    this._drawingMode = mode;
    if (mode !== 'freehand') this.shapeTool.setSettings({ type: mode });
  }

  // ── document lifecycle ───────────────────────────────────────────────

  /**
   * Start editing `bitmap`. The editor takes ownership of it and keeps a
   * private copy as the original. Any layer stack is discarded.
   */
  loadBitmap(bitmap: Bitmap, path: string | null = null): void {
    this.preview = null;
    this.services.layers.resetLayerMode();
    this.original = cloneBitmap(bitmap);
    this.working = bitmap;
    this.path = path;
    this.syncToolBounds();
    this.services.viewport.reset();
    this.setDirty(false);
    this.services.bus.emit('image:loaded', { path, width: bitmap.width, height: bitmap.height });
    this.services.bus.emit('image:changed');
  }

  /** Drop the image, layers and preview. */
  clear(): void {
    this.preview = null;
    this.services.layers.resetLayerMode();
    this.original = null;
    this.working = null;
    this.path = null;
    this.syncToolBounds();
    this.setDirty(false);
    this.services.bus.emit('image:changed');
  }

  /** Discard every edit, layers included. */
  resetToOriginal(): boolean {
    if (!this.original) return false;
    this.preview = null;
    this.services.layers.resetLayerMode();
    this.working = cloneBitmap(this.original);
    this.syncToolBounds();
    this.setDirty(false);
    this.services.bus.emit('image:changed');
    return true;
  }

  /** Record a successful save of the composite to `path`. */
  markSaved(path: string): void {
    this.path = path;
    this.setDirty(false);
  }

  /** Move the working bitmap into a new layer stack. */
  enableLayerMode(name = 'Background'): boolean {
    const working = this.working;
    if (!working || this.services.layers.isLayerMode) return false;
    this.clearPreview(false);
    if (!this.services.layers.enableLayerMode(working, name)) return false;
    this.working = null;
    this.services.bus.emit('image:changed');
    return true;
  }

  /** Flatten the stack back into the working bitmap. */
  disableLayerMode(): boolean {
    this.clearPreview(false);
    const flattened = this.services.layers.disableLayerMode();
    if (!flattened) return false;
    this.working = flattened;
    this.syncToolBounds();
    this.services.bus.emit('image:changed');
    return true;
  }

  // ── pointer routing ──────────────────────────────────────────────────

  /** Returns true when the frame needs a redraw. */
  handlePointerDown(point: Point, modifiers: Modifiers = NO_MODIFIERS): boolean {
    if (!this.hasImage) return false;
    switch (this.services.tools.activeToolId) {
      case ToolIds.Crop:
        return this.cropTool.onPointerDown(point);
      case ToolIds.Drawing:
        return this._drawingMode === 'freehand'
          ? this.drawingTool.onPointerDown(point, modifiers)
          : this.shapeTool.onPointerDown(point, modifiers);
      default:
        return false;
    }
  }

  handlePointerMove(point: Point, modifiers: Modifiers = NO_MODIFIERS): boolean {
    if (!this.hasImage) return false;
    switch (this.services.tools.activeToolId) {
      case ToolIds.Crop:
        return this.cropTool.onPointerMove(point);
      case ToolIds.Drawing:
        return this._drawingMode === 'freehand'
          ? this.drawingTool.onPointerMove(point, modifiers)
          : this.shapeTool.onPointerMove(point, modifiers);
      default:
        return false;
    }
  }

  /**
   * Finish the gesture. Drawing and shape tools publish their primitive on
   * the bus here; the host decides whether to bake it.
   */
  handlePointerUp(): boolean {
    switch (this.services.tools.activeToolId) {
      case ToolIds.Crop:
        return this.cropTool.onPointerUp();
      case ToolIds.Drawing:
        return this._drawingMode === 'freehand'
          ? this.drawingTool.onPointerUp() !== null
          : this.shapeTool.onPointerUp() !== null;
      default:
        return false;
    }
  }

  getCursor(point: Point): CursorKind {
    if (!this.hasImage) return 'default';
    switch (this.services.tools.activeToolId) {
      case ToolIds.Crop:
        return cursorForHandle(this.cropTool.getCursorForPoint(point));
      case ToolIds.Drawing:
        return 'crosshair';
      default:
        return 'default';
    }
  }

  // ── crop ─────────────────────────────────────────────────────────────

  /** Crop to `rect` (image pixels, clamped). Crops every layer in layer mode. */
  crop(rect: Rect): boolean {
    if (!this.hasImage || rect.width <= 0 || rect.height <= 0) return false;

    const left = clamp(Math.round(rect.x), 0, this.width);
    const top = clamp(Math.round(rect.y), 0, this.height);
    const right = clamp(Math.round(rect.x + rect.width), 0, this.width);
    const bottom = clamp(Math.round(rect.y + rect.height), 0, this.height);
    if (right <= left || bottom <= top) return false;
    const clamped = { x: left, y: top, width: right - left, height: bottom - top };

    this.clearPreview(false);
    if (this.services.layers.isLayerMode) {
      if (!this.services.layers.cropAll(clamped)) return false;
    } else if (this.working) {
      this.working = cropBitmap(this.working, clamped);
    }

    this.syncToolBounds();
    this.markChanged();
    return true;
  }

  /** Crop to the crop tool's region. The region is cleared; the tool stays active. */
  applyCrop(): boolean {
    const rect = this.cropTool.getImageCropRect();
    if (!rect) return false;
    return this.crop(rect);
  }

  /** Drop the crop region without touching pixels. */
  cancelCrop(): boolean {
    if (!this.cropTool.hasRegion) return false;
    this.cropTool.clearRegion();
    this.services.bus.emit('image:changed');
    return true;
  }

  // ── strokes and shapes ───────────────────────────────────────────────

  /** Bake a finished stroke into the edit target. */
  applyStroke(stroke: DrawingStroke): boolean {
    if (stroke.points.length === 0) return false;
    const target = this.editTarget();
    if (!target) return false;
    this.clearPreview(false);
    rasterizeStroke(target.bitmap, stroke);
    this.afterInPlaceEdit(target);
    return true;
  }

  /** Bake a finished shape into the edit target. */
  applyShape(shape: ShapeDescriptor): boolean {
    const target = this.editTarget();
    if (!target) return false;
    this.clearPreview(false);
    rasterizeShape(target.bitmap, shape);
    this.afterInPlaceEdit(target);
    return true;
  }

  // ── adjustments ──────────────────────────────────────────────────────

  setBrightnessContrastPreview(settings: BrightnessContrastSettings): boolean {
    return this.setPreview({ kind: 'brightness-contrast', settings });
  }

  setColorBalancePreview(settings: ColorBalanceSettings): boolean {
    return this.setPreview({ kind: 'color-balance', settings });
  }

  /**
   * Show `adjustment` over the edit target without committing it. A no-op
   * adjustment empties the slot. The preview follows the edit target: after
   * the active layer changes it is shown over the new one, and over nothing
   * while the active layer is locked.
   */
  setPreview(adjustment: AdjustmentSettings): boolean {
    if (!this.editTarget()) return false;
    if (isAdjustmentNoOp(adjustment)) {
      this.clearPreview();
      return true;
    }
    this.preview = { adjustment, cache: null };
    this.services.bus.emit('image:changed');
    return true;
  }

  /** Empty the preview slot. */
  clearPreview(redraw = true): void {
    if (!this.preview) return;
    this.preview = null;
    if (redraw) this.services.bus.emit('image:changed');
  }

  applyBrightnessContrast(settings: BrightnessContrastSettings): boolean {
    return this.applyAdjustment({ kind: 'brightness-contrast', settings });
  }

  applyColorBalance(settings: ColorBalanceSettings): boolean {
    return this.applyAdjustment({ kind: 'color-balance', settings });
  }

  /**
   * Bake `adjustment` into the edit target and empty the preview slot.
   * A no-op adjustment succeeds without changing pixels.
   */
  applyAdjustment(adjustment: AdjustmentSettings): boolean {
    const target = this.editTarget();
    if (!target) return false;
    if (isAdjustmentNoOp(adjustment)) {
      this.clearPreview();
      return true;
    }

    this.clearPreview(false);
    const result = applyAdjustment(target.bitmap, adjustment);
    if (target.layer) {
      if (!this.services.layers.replaceLayerBitmap(target.layer, result)) return false;
    } else {
      this.working = result;
    }
    this.markChanged();
    return true;
  }

  /** Commit whatever adjustment is in the preview slot. */
  applyPreview(): boolean {
    const preview = this.preview;
    if (!preview) return false;
    return this.applyAdjustment(preview.adjustment);
  }

  // ── transforms ───────────────────────────────────────────────────────

  /** Rotate or flip the image, every layer at once in layer mode. */
  applyTransform(transform: ImageTransform): boolean {
    if (!this.hasImage) return false;
    this.clearPreview(false);
    if (this.services.layers.isLayerMode) {
      this.services.layers.transformAll((bitmap) => applyImageTransform(bitmap, transform));
    } else if (this.working) {
      this.working = applyImageTransform(this.working, transform);
    }
    this.syncToolBounds();
    this.markChanged();
    return true;
  }

  // ── output ───────────────────────────────────────────────────────────

  /** The frame to display: committed pixels with the preview in place of the edit target. */
  getDisplayBitmap(): Bitmap | null {
    const { layers } = this.services;
    const frame = this.previewFrame();
    if (layers.isLayerMode) {
      return frame ? layers.flattenWithActiveSubstitute(frame) : layers.flatten();
    }
    return frame ?? this.working;
  }

  /** Committed pixels only, flattened in layer mode. */
  getCompositeBitmap(): Bitmap | null {
    return this.services.layers.isLayerMode ? this.services.layers.flatten() : this.working;
  }

  /** Release every bitmap. */
  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    this.preview = null;
    this.services.layers.dispose();
    this.original = null;
    this.working = null;
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private editTarget(): EditTarget | null {
    const target = this.currentTarget();
    const active = this.services.layers.activeLayer;
    if (!target && active) {
      this.services.logger.debug(`Layer "${active.name}" is locked`);
    }
    return target;
  }

  private currentTarget(): EditTarget | null {
    const { layers } = this.services;
    if (layers.isLayerMode) {
      const layer = layers.activeLayer;
      if (!layer?.canEdit) return null;
      return { bitmap: layer.bitmap, layer };
    }
    return this.working ? { bitmap: this.working, layer: null } : null;
  }

  /** The adjusted edit target, or `null` when nothing is being previewed. */
  private previewFrame(): Bitmap | null {
    const preview = this.preview;
    if (!preview) return null;
    const target = this.currentTarget();
    if (!target) return null;
    let cache = preview.cache;
    if (!cache || cache.source !== target.bitmap) {
      cache = { source: target.bitmap, frame: applyAdjustment(target.bitmap, preview.adjustment) };
      preview.cache = cache;
    }
    return cache.frame;
  }

  private afterInPlaceEdit(target: EditTarget): void {
    if (target.layer) this.services.layers.notifyLayerContentChanged(target.layer);
    this.markChanged();
  }

  private syncToolBounds(): void {
    const { width, height } = this;
    this.cropTool.setImageSize(width, height);
    this.drawingTool.setImageSize(width, height);
    this.shapeTool.setImageSize(width, height);
  }

  private markChanged(): void {
    this.setDirty(true);
    this.services.bus.emit('image:changed');
  }

  private setDirty(dirty: boolean): void {
    if (this.dirty === dirty) return;
    this.dirty = dirty;
    this.services.bus.emit('document:dirty', { isDirty: dirty });
  }
}

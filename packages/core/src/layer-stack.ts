/**
 * @module layer-stack
 * Ordered collection of layers composited bottom-to-top (index 0 is the
 * bottom) plus the active-layer reference.
 *
 * Invariants kept by every method:
 * - every layer has the stack's width and height;
 * - the active layer, when set, is a member of the stack;
 * - removing never leaves the stack empty.
 *
 * The stack owns its layers: removed, merged and flattened layers are
 * disposed here. It emits nothing itself; {@link LayerManager} publishes
 * events after each mutation.
 */

import type { Bitmap, Rect } from '@layerkit/types';
import { compositeOver, createBitmap } from './bitmap';
import { LayerImpl } from './layer';

export class LayerStack {
  private readonly _layers: LayerImpl[] = [];
  private _activeLayer: LayerImpl | null = null;
  private _width: number;
  private _height: number;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Invalid layer stack size ${width}x${height}`);
    }
    this._width = width;
    this._height = height;
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  get count(): number {
    return this._layers.length;
  }

  /** Layers bottom-to-top. The returned array is a copy. */
  get layers(): readonly LayerImpl[] {
    return [...this._layers];
  }

  get activeLayer(): LayerImpl | null {
    return this._activeLayer;
  }

  get activeLayerIndex(): number {
    return this._activeLayer ? this._layers.indexOf(this._activeLayer) : -1;
  }

  at(index: number): LayerImpl | undefined {
    return this._layers[index];
  }

  indexOf(layer: unknown): number {
    return this._layers.findIndex((l) => l === layer);
  }

  /** Look up a member by reference, or `null` for non-members. */
  find(layer: unknown): LayerImpl | null {
    return this._layers.find((l) => l === layer) ?? null;
  }

  /** Select a member layer. Non-members are ignored. */
  setActiveLayer(layer: LayerImpl): boolean {
    if (!this._layers.includes(layer)) return false;
    this._activeLayer = layer;
    return true;
  }

  /** Add a transparent layer on top and make it active. */
  addLayer(name?: string): LayerImpl {
    const layer = LayerImpl.blank(name ?? this.nextLayerName(), this._width, this._height);
    return this.insertLayer(this._layers.length, layer);
  }

  /**
   * Add a layer holding a copy of `bitmap` on top and make it active.
   * @throws RangeError if the bitmap size differs from the stack.
   */
  addLayerFromBitmap(bitmap: Bitmap, name?: string): LayerImpl {
    this.assertSize(bitmap.width, bitmap.height);
    const layer = LayerImpl.fromBitmap(name ?? this.nextLayerName(), bitmap);
    return this.insertLayer(this._layers.length, layer);
  }

  /**
   * Insert an existing layer (index clamped) and make it active. The stack
   * takes ownership.
   * @throws RangeError if the layer size differs from the stack.
   */
  insertLayer(index: number, layer: LayerImpl): LayerImpl {
    this.assertSize(layer.width, layer.height);
    const at = Math.max(0, Math.min(index, this._layers.length));
    this._layers.splice(at, 0, layer);
    this._activeLayer = layer;
    return layer;
  }

  /**
   * Remove and dispose a layer. The last remaining layer cannot be removed.
   * When the active layer goes, the layer now at the same index (or the new
   * top) becomes active.
   */
  removeLayer(layer: LayerImpl): boolean {
    if (this._layers.length <= 1) return false;
    const index = this._layers.indexOf(layer);
    if (index < 0) return false;

    this._layers.splice(index, 1);
    if (this._activeLayer === layer) {
      this._activeLayer = this._layers[Math.min(index, this._layers.length - 1)];
    }
    layer.dispose();
    return true;
  }

  /** Insert a copy directly above `layer` and make it active. */
  duplicateLayer(layer: LayerImpl): LayerImpl | null {
    const index = this._layers.indexOf(layer);
    if (index < 0) return null;
    return this.insertLayer(index + 1, layer.clone());
  }

  /** Move one step towards the top. */
  moveLayerUp(layer: LayerImpl): boolean {
    const index = this._layers.indexOf(layer);
    if (index < 0 || index >= this._layers.length - 1) return false;
    this.swap(index, index + 1);
    return true;
  }

  /** Move one step towards the bottom. */
  moveLayerDown(layer: LayerImpl): boolean {
    const index = this._layers.indexOf(layer);
    if (index <= 0) return false;
    this.swap(index, index - 1);
    return true;
  }

  /**
   * Composite `layer` onto the layer directly below it, then remove it.
   * The layer below becomes active. Invisible layers contribute nothing.
   * @returns The layer that received the pixels, or `null` when `layer` is
   *   the bottom layer, not a member, or the target is locked.
   */
  mergeDown(layer: LayerImpl): LayerImpl | null {
    const index = this._layers.indexOf(layer);
    if (index <= 0) return null;

    const below = this._layers[index - 1];
    if (!below.canEdit) return null;

    if (layer.visible) {
      compositeOver(below.bitmap, layer.bitmap, layer.opacity);
    }

    this._layers.splice(index, 1);
    layer.dispose();
    this._activeLayer = below;
    return below;
  }

  /**
   * Replace every layer with a single "Merged" layer holding the composite
   * of the visible ones.
   */
  mergeVisible(): LayerImpl {
    return this.replaceAllWith(new LayerImpl('Merged', this.flatten()));
  }

  /**
   * Replace every layer with a single layer holding the composite. The
   * result is named "Flattened" when more than one layer existed, otherwise
   * the single layer keeps its name.
   */
  flattenAll(): LayerImpl {
    const name = this._layers.length === 1 ? this._layers[0].name : 'Flattened';
    return this.replaceAllWith(new LayerImpl(name, this.flatten()));
  }

  /**
   * Composite visible layers bottom-to-top with their opacity into a new
   * bitmap. The stack is not modified; the caller owns the result.
   */
  flatten(): Bitmap {
    const result = createBitmap(this._width, this._height);
    for (const layer of this._layers) {
      if (!layer.visible) continue;
      compositeOver(result, layer.bitmap, layer.opacity);
    }
    return result;
  }

  /**
   * Composite like {@link flatten} but draw `substitute` in place of
   * `layer`'s pixels. Used to show an adjustment preview of one layer.
   */
  flattenWithSubstitute(layer: LayerImpl, substitute: Bitmap): Bitmap {
    this.assertSize(substitute.width, substitute.height);
    const result = createBitmap(this._width, this._height);
    for (const l of this._layers) {
      if (!l.visible) continue;
      compositeOver(result, l === layer ? substitute : l.bitmap, l.opacity);
    }
    return result;
  }

  /** Crop every layer to `rect` and adopt its size. */
  cropAll(rect: Rect): boolean {
    if (rect.width <= 0 || rect.height <= 0) return false;
    for (const layer of this._layers) {
      layer.crop(rect);
    }
    this._width = rect.width;
    this._height = rect.height;
    return true;
  }

  /**
   * Replace every layer's bitmap with `transform(bitmap)`. All results must
   * share one size, which becomes the stack size.
   * @throws Error if the results disagree in size; no layer is changed then.
   */
  transformAll(transform: (bitmap: Bitmap) => Bitmap): void {
    const results = this._layers.map((layer) => transform(layer.bitmap));
    if (results.length === 0) return;

    const { width, height } = results[0];
    if (results.some((r) => r.width !== width || r.height !== height)) {
      throw new Error('transformAll produced bitmaps of different sizes');
    }
    this._layers.forEach((layer, i) => layer.replaceBitmap(results[i]));
    this._width = width;
    this._height = height;
  }

  /** Dispose every layer and empty the stack. */
  dispose(): void {
    for (const layer of this._layers) {
      layer.dispose();
    }
    this._layers.length = 0;
    this._activeLayer = null;
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private nextLayerName(): string {
    return `Layer ${this._layers.length + 1}`;
  }

  private swap(a: number, b: number): void {
    const tmp = this._layers[a];
    this._layers[a] = this._layers[b];
    this._layers[b] = tmp;
  }

  private replaceAllWith(layer: LayerImpl): LayerImpl {
    for (const old of this._layers) {
      old.dispose();
    }
    this._layers.length = 0;
    this._layers.push(layer);
    this._activeLayer = layer;
    return layer;
  }

  private assertSize(width: number, height: number): void {
    if (width !== this._width || height !== this._height) {
      throw new RangeError(
        `Layer size ${width}x${height} does not match stack size ${this._width}x${this._height}`,
      );
    }
  }
}

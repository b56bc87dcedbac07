/**
 * @module layer
 * Concrete {@link Layer}: one named pixel buffer with visibility, opacity and
 * lock state. The mutators live here only; the layer stack is the one
 * holder of `LayerImpl` references and hands out the read-only view.
 *
 * The layer owns its bitmap. Anything that swaps the buffer releases the old
 * one first, and `dispose()` releases it for good; touching `bitmap`
 * afterwards throws so use-after-release shows up immediately.
 */

import type { Bitmap, Color, Layer, Rect } from '@layerkit/types';
import { cloneBitmap, createBitmap, fillBitmap } from './bitmap';
import { canvasResize, cropBitmap } from './transform';
import { generateId } from './uuid';

/** Opacity changes smaller than this are ignored. */
const OPACITY_EPSILON = 0.001;

export class LayerImpl implements Layer {
  readonly id: string;
  name: string;
  visible = true;
  locked = false;

  private _opacity = 1;
  private _bitmap: Bitmap | null;

  /**
   * @param name   - Display name.
   * @param bitmap - Buffer to adopt. Ownership transfers to the layer.
   */
  constructor(name: string, bitmap: Bitmap, id: string = generateId()) {
    this.id = id;
    this.name = name;
    this._bitmap = bitmap;
  }

  /** Create a transparent layer of the given size. */
  static blank(name: string, width: number, height: number): LayerImpl {
    return new LayerImpl(name, createBitmap(width, height));
  }

  /** Create a layer holding a copy of `bitmap`. The caller keeps its bitmap. */
  static fromBitmap(name: string, bitmap: Bitmap): LayerImpl {
    return new LayerImpl(name, cloneBitmap(bitmap));
  }

  get opacity(): number {
    return this._opacity;
  }

  set opacity(value: number) {
    const clamped = Math.max(0, Math.min(1, value));
    if (Math.abs(clamped - this._opacity) < OPACITY_EPSILON) return;
    this._opacity = clamped;
  }

  get bitmap(): Bitmap {
    if (!this._bitmap) {
      throw new Error(`Layer "${this.name}" has been disposed`);
    }
    return this._bitmap;
  }

  get width(): number {
    return this.bitmap.width;
  }

  get height(): number {
    return this.bitmap.height;
  }

  get isDisposed(): boolean {
    return this._bitmap === null;
  }

  get canEdit(): boolean {
    return !this.locked && this._bitmap !== null;
  }

  clear(): void {
    this.bitmap.data.fill(0);
  }

  fill(color: Color): void {
    fillBitmap(this.bitmap, color);
  }

  replaceBitmap(bitmap: Bitmap): void {
    this.assertAlive();
    this._bitmap = bitmap;
  }

  clone(): LayerImpl {
    const copy = new LayerImpl(`${this.name} Copy`, cloneBitmap(this.bitmap));
    copy.visible = this.visible;
    copy.opacity = this._opacity;
    copy.locked = this.locked;
    return copy;
  }

  crop(rect: Rect): void {
    this.replaceBitmap(cropBitmap(this.bitmap, rect));
  }

  resize(width: number, height: number): void {
    if (width === this.width && height === this.height) return;
    this.replaceBitmap(canvasResize(this.bitmap, width, height));
  }

  dispose(): void {
    this._bitmap = null;
  }

  private assertAlive(): void {
    if (!this._bitmap) {
      throw new Error(`Layer "${this.name}" has been disposed`);
    }
  }
}

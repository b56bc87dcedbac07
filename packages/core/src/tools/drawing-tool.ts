/**
 * @module tools/drawing-tool
 * Freehand brush input.
 *
 * Points are collected in image space while the pointer is held. With Shift
 * held the stroke becomes a single straight segment from the press point to
 * the pointer, snapped to the nearest horizontal, vertical or diagonal.
 * Releasing publishes `drawing:stroke-completed` and discards the points.
 */

import type { BrushSettings, DrawingStroke, EventBus, Modifiers, Point } from '@layerkit/types';
import { DEFAULT_EDITOR_OPTIONS } from '../options';
import { pointInRect, snapToAngle } from '../geometry';

const NO_MODIFIERS: Modifiers = { shift: false };

export class DrawingTool {
  private brush: BrushSettings;
  private imageWidth = 0;
  private imageHeight = 0;

  private points: Point[] = [];
  private lineStart: Point = { x: 0, y: 0 };
  private lastPoint: Point = { x: 0, y: 0 };
  private straightLine = false;
  private _isDrawing = false;

  constructor(
    private readonly bus: EventBus,
    brush: BrushSettings = DEFAULT_EDITOR_OPTIONS.defaultBrush,
  ) {
    this.brush = { ...brush, color: { ...brush.color } };
  }

  get settings(): BrushSettings {
    return { ...this.brush, color: { ...this.brush.color } };
  }

  get isDrawing(): boolean {
    return this._isDrawing;
  }

  /** Merge brush changes. Sizes below one pixel are raised to one. */
  setBrush(changes: Partial<BrushSettings>): void {
    const next = { ...this.brush, ...changes };
    this.brush = { ...next, color: { ...next.color }, size: Math.max(1, next.size) };
  }

  /** Set the drawable bounds. Cancels a stroke in progress. */
  setImageSize(width: number, height: number): void {
    this.imageWidth = width;
    this.imageHeight = height;
    this.cancel();
  }

  onPointerDown(point: Point, modifiers: Modifiers = NO_MODIFIERS): boolean {
    if (this.imageWidth <= 0 || this.imageHeight <= 0) return false;
    if (!pointInRect(point, { x: 0, y: 0, width: this.imageWidth, height: this.imageHeight })) {
      return false;
    }

    this._isDrawing = true;
    this.straightLine = modifiers.shift;
    this.lineStart = { ...point };
    this.lastPoint = { ...point };
    this.points = [{ ...point }];
    return true;
  }

  onPointerMove(point: Point, modifiers: Modifiers = NO_MODIFIERS): boolean {
    if (!this._isDrawing) return false;

    this.straightLine = modifiers.shift;
    this.lastPoint = { ...point };
    if (!this.straightLine) {
      this.points.push({ ...point });
    }
    return true;
  }

  /**
   * Finish the stroke and publish it. Returns the stroke, or null when no
   * stroke was in progress.
   */
  onPointerUp(): DrawingStroke | null {
    if (!this._isDrawing) return null;
    const stroke = this.getPreview();
    this.cancel();
    if (stroke) {
      this.bus.emit('drawing:stroke-completed', stroke);
    }
    return stroke;
  }

  /** Drop the stroke in progress without publishing it. */
  cancel(): void {
    this._isDrawing = false;
    this.straightLine = false;
    this.points = [];
  }

  /** The stroke as it would be committed right now. */
  getPreview(): DrawingStroke | null {
    if (!this._isDrawing) return null;
    const points = this.straightLine
      ? [{ ...this.lineStart }, snapToAngle(this.lineStart, this.lastPoint)]
      : this.points.map((p) => ({ ...p }));
    return {
      points,
      color: { ...this.brush.color },
      size: this.brush.size,
      shape: this.brush.shape,
    };
  }
}

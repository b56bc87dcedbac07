/**
 * @module tools/shape-tool
 * Parametric shape input: press to anchor, drag to size, release to publish
 * `shape:completed`. Shift squares rectangles, ellipses and crosses and
 * snaps lines and arrows to 45° steps. Drags shorter than the minimum on
 * both axes are discarded.
 */

import type {
  EventBus,
  Modifiers,
  ParametricShapeType,
  Point,
  ShapeDescriptor,
  ShapeSettings,
} from '@layerkit/types';
import { DEFAULT_EDITOR_OPTIONS } from '../options';
import { constrainToSquare, pointInRect, snapToAngle } from '../geometry';

const NO_MODIFIERS: Modifiers = { shift: false };

/** End point after the proportion constraint for `type`. */
export function constrainShapeEnd(type: ParametricShapeType, start: Point, current: Point): Point {
  switch (type) {
    case 'line':
    case 'arrow':
      return snapToAngle(start, current);
    case 'rectangle':
    case 'ellipse':
    case 'cross':
      return constrainToSquare(start, current);
  }
}

export class ShapeTool {
  private shape: ShapeSettings;
  private imageWidth = 0;
  private imageHeight = 0;

  private start: Point = { x: 0, y: 0 };
  private current: Point = { x: 0, y: 0 };
  private constrained = false;
  private _isDrawing = false;

  constructor(
    private readonly bus: EventBus,
    settings: ShapeSettings = DEFAULT_EDITOR_OPTIONS.defaultShape,
    private readonly minDrag: number = DEFAULT_EDITOR_OPTIONS.minShapeDrag,
  ) {
    this.shape = copySettings(settings);
  }

  get settings(): ShapeSettings {
    return copySettings(this.shape);
  }

  get isDrawing(): boolean {
    return this._isDrawing;
  }

  /** Merge setting changes. Stroke widths below one pixel are raised to one. */
  setSettings(changes: Partial<ShapeSettings>): void {
    const next = copySettings({ ...this.shape, ...changes });
    next.strokeWidth = Math.max(1, next.strokeWidth);
    this.shape = next;
  }

  /** Set the drawable bounds. Cancels a shape in progress. */
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
    this.constrained = modifiers.shift;
    this.start = { ...point };
    this.current = { ...point };
    return true;
  }

  onPointerMove(point: Point, modifiers: Modifiers = NO_MODIFIERS): boolean {
    if (!this._isDrawing) return false;
    this.constrained = modifiers.shift;
    this.current = { ...point };
    return true;
  }

  /**
   * Finish the shape. Publishes and returns it, or returns null when no
   * shape was in progress or the drag was too short.
   */
  onPointerUp(): ShapeDescriptor | null {
    if (!this._isDrawing) return null;
    const shape = this.getPreview();
    this.cancel();
    if (!shape) return null;

    const dx = Math.abs(shape.end.x - shape.start.x);
    const dy = Math.abs(shape.end.y - shape.start.y);
    if (dx < this.minDrag && dy < this.minDrag) return null;

    this.bus.emit('shape:completed', shape);
    return shape;
  }

  cancel(): void {
    this._isDrawing = false;
    this.constrained = false;
  }

  /** The shape as it would be committed right now. */
  getPreview(): ShapeDescriptor | null {
    if (!this._isDrawing) return null;
    const end = this.constrained
      ? constrainShapeEnd(this.shape.type, this.start, this.current)
      : { ...this.current };
    return {
      type: this.shape.type,
      start: { ...this.start },
      end,
      fillMode: this.shape.fillMode,
      strokeColor: { ...this.shape.strokeColor },
      fillColor: { ...this.shape.fillColor },
      strokeWidth: this.shape.strokeWidth,
    };
  }
}

function copySettings(settings: ShapeSettings): ShapeSettings {
  return {
    ...settings,
    strokeColor: { ...settings.strokeColor },
    fillColor: { ...settings.fillColor },
  };
}

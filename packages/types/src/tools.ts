/**
 * @module tools
 * Value types produced and consumed by the interactive tools.
 */

import type { Color, Point, Rect } from './common';

/** Brush tip shape used by freehand strokes. */
export type BrushShape = 'round' | 'square';

/** Freehand brush settings. */
export interface BrushSettings {
  color: Color;
  /** Brush diameter in image pixels. */
  size: number;
  shape: BrushShape;
}

/** A finished freehand stroke in image-space coordinates. */
export interface DrawingStroke {
  points: Point[];
  color: Color;
  size: number;
  shape: BrushShape;
}

/**
 * Drawing mode. `freehand` routes input to the drawing tool, every other
 * value routes it to the shape tool.
 */
export type ShapeType = 'freehand' | 'rectangle' | 'ellipse' | 'line' | 'arrow' | 'cross';

/** Parametric shape types (everything except freehand). */
export type ParametricShapeType = Exclude<ShapeType, 'freehand'>;

/** How a closed shape is painted. Lines and arrows are always stroked. */
export type ShapeFillMode = 'stroke' | 'fill' | 'fill-and-stroke';

/** Shape tool settings. */
export interface ShapeSettings {
  type: ParametricShapeType;
  fillMode: ShapeFillMode;
  strokeColor: Color;
  fillColor: Color;
  /** Stroke width in image pixels. */
  strokeWidth: number;
}

/** A finished parametric shape in image-space coordinates. */
export interface ShapeDescriptor {
  type: ParametricShapeType;
  /** Anchor point (pointer-down). */
  start: Point;
  /** Opposite point (pointer-up), after constraints. */
  end: Point;
  fillMode: ShapeFillMode;
  strokeColor: Color;
  fillColor: Color;
  strokeWidth: number;
}

/** Part of the crop region grabbed by a drag. */
export type CropHandle =
  | 'none'
  | 'top-left'
  | 'top'
  | 'top-right'
  | 'right'
  | 'bottom-right'
  | 'bottom'
  | 'bottom-left'
  | 'left'
  | 'move';

/** Cursor hint for pointer feedback, derived from the handle under the pointer. */
export type CursorKind =
  | 'default'
  | 'crosshair'
  | 'move'
  | 'nwse-resize'
  | 'nesw-resize'
  | 'ns-resize'
  | 'ew-resize';

/** Snapshot of the crop region for rendering. */
export interface CropRegionState {
  /** Region in image pixels (fractional while dragging). */
  region: Rect;
  activeHandle: CropHandle;
  isDragging: boolean;
}

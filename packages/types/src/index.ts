/**
 * @layerkit/types
 *
 * Shared type definitions for the editing engine.
 * This package contains no runtime code, only TypeScript interfaces and
 * types that serve as the contract between all packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Color, Modifiers, Point, Rect, Size } from './common';

// Pixels
export type { Bitmap } from './bitmap';

// Layers
export type { Layer, LayerChangeType, LayerProperty } from './layer';

// Viewport
export type { ViewportState } from './viewport';

// Tools
export type {
  BrushSettings,
  BrushShape,
  CropHandle,
  CropRegionState,
  CursorKind,
  DrawingStroke,
  ParametricShapeType,
  ShapeDescriptor,
  ShapeFillMode,
  ShapeSettings,
  ShapeType,
} from './tools';

// Adjustments
export type {
  AdjustmentSettings,
  BrightnessContrastSettings,
  ColorBalanceSettings,
  ToneBalance,
} from './adjustments';

// Document I/O
export type { DocumentService, ImageFormat } from './document';

// Logging
export type { Logger } from './logger';

// Events
export type { EventBus, EventCallback, EventMap } from './events';

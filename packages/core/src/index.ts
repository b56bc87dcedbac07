/**
 * @layerkit/core
 *
 * Editing engine: event bus, layers, viewport and tool state, the crop,
 * drawing and shape tools, color adjustments and the editor core that ties
 * them together.
 *
 * @packageDocumentation
 */

// Infrastructure
export { EventBusImpl } from './event-bus';
export { consoleLogger, silentLogger } from './logger';
export { DEFAULT_EDITOR_OPTIONS, resolveEditorOptions } from './options';
export type { EditorOptions } from './options';
export { generateId } from './uuid';

// Pixels and geometry
export {
  createBitmap,
  bitmapFromData,
  cloneBitmap,
  fillBitmap,
  getPixel,
  setPixel,
  blendPixel,
  compositeOver,
  bitmapsEqual,
  hashBitmap,
} from './bitmap';
export type { Rgba } from './bitmap';
export {
  flipHorizontal,
  flipVertical,
  rotate90CW,
  rotate90CCW,
  rotate180,
  applyImageTransform,
  cropBitmap,
  canvasResize,
} from './transform';
export type { ImageTransform } from './transform';
export { clamp, rectFromPoints, snapToAngle, constrainToSquare, pointInRect } from './geometry';
export { CoverageMask, strokeCoverage, rasterizeStroke, arrowHead, rasterizeShape } from './raster';
export type { ArrowHead } from './raster';

// Layers
export { LayerImpl } from './layer';
export { LayerStack } from './layer-stack';
export { LayerManager } from './layer-manager';

// Managers
export { ViewportManager } from './viewport-manager';
export type { ViewportOptions } from './viewport-manager';
export { ToolManager, ToolIds } from './tool-manager';

// Tools
export { CropTool, cursorForHandle } from './tools/crop-tool';
export type { CropToolOptions } from './tools/crop-tool';
export { DrawingTool } from './tools/drawing-tool';
export { ShapeTool, constrainShapeEnd } from './tools/shape-tool';

// Adjustments
export {
  NEUTRAL_TONE,
  neutralColorBalance,
  isBrightnessContrastNoOp,
  isColorBalanceNoOp,
  isAdjustmentNoOp,
  applyBrightnessContrast,
  applyColorBalance,
  applyAdjustment,
} from './filters/adjustments';

// Editor
export { createEditorServices } from './editor-services';
export type { EditorServices, EditorServiceOverrides } from './editor-services';
export { ImageEditorCore } from './editor-core';

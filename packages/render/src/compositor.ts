/**
 * @module compositor
 * Software frame compositor.
 *
 * Produces one RGBA frame of the view size from the display bitmap (layers
 * already composited, preview overlay already substituted), the viewport
 * state and whatever the active tool is drawing:
 *
 * 1. Background fill.
 * 2. Display bitmap, nearest-neighbour sampled into its screen rect.
 * 3. Crop overlay: dimming outside the region, rule-of-thirds grid, border
 *    and handles.
 * 4. In-progress stroke or shape, scaled to screen space.
 *
 * Every call redraws from scratch; nothing is cached between frames.
 */

import type {
  Bitmap,
  Color,
  CropRegionState,
  DrawingStroke,
  Rect,
  ShapeDescriptor,
  Size,
  ViewportState,
} from '@layerkit/types';
import { CoverageMask, blendPixel, createBitmap, fillBitmap, rasterizeShape, rasterizeStroke } from '@layerkit/core';
import { ViewportTransform } from './viewport';

/** Pasteboard colour behind the image. */
export const DEFAULT_BACKGROUND: Readonly<Color> = Object.freeze({ r: 30, g: 30, b: 30, a: 1 });

/** Alpha (0-255) of the black veil drawn outside the crop region. */
export const CROP_DIM_ALPHA = 180;

const CROP_BORDER_WIDTH = 2;
const CROP_HANDLE_SIZE = 8;
const WHITE: Color = { r: 255, g: 255, b: 255, a: 1 };

/** Everything needed to draw one frame. Bitmaps are borrowed for the call. */
export interface FrameInput {
  viewSize: Size;
  /** Display bitmap, or null when no image is loaded. */
  image: Bitmap | null;
  viewport: ViewportState;
  background?: Color;
  crop?: CropRegionState | null;
  stroke?: DrawingStroke | null;
  shape?: ShapeDescriptor | null;
}

export interface RenderedFrame {
  frame: Bitmap;
  /** Mapping used for this frame; null when no image was drawn. */
  transform: ViewportTransform | null;
}

/** Draw a full frame. */
export function renderFrame(input: FrameInput): RenderedFrame {
  const frame = createBitmap(
    Math.max(1, Math.floor(input.viewSize.width)),
    Math.max(1, Math.floor(input.viewSize.height)),
  );
  fillBitmap(frame, input.background ?? DEFAULT_BACKGROUND);

  const { image } = input;
  if (!image) return { frame, transform: null };

  const transform = ViewportTransform.compute(image, input.viewSize, input.viewport);
  drawImage(frame, image, transform);

  if (input.crop) drawCropOverlay(frame, transform.imageRectToScreen(input.crop.region));

  if (input.stroke && input.stroke.points.length > 0) {
    rasterizeStroke(frame, {
      ...input.stroke,
      points: input.stroke.points.map((p) => transform.imageToScreen(p)),
      size: input.stroke.size * transform.scale,
    });
  }

  if (input.shape) {
    rasterizeShape(frame, {
      ...input.shape,
      start: transform.imageToScreen(input.shape.start),
      end: transform.imageToScreen(input.shape.end),
      strokeWidth: input.shape.strokeWidth * transform.scale,
    });
  }

  return { frame, transform };
}

function drawImage(frame: Bitmap, image: Bitmap, transform: ViewportTransform): void {
  const { imageRect, scale } = transform;
  const x0 = Math.max(0, Math.floor(imageRect.x));
  const y0 = Math.max(0, Math.floor(imageRect.y));
  const x1 = Math.min(frame.width, Math.ceil(imageRect.x + imageRect.width));
  const y1 = Math.min(frame.height, Math.ceil(imageRect.y + imageRect.height));
  const src = image.data;

  for (let sy = y0; sy < y1; sy++) {
    const iy = Math.floor((sy + 0.5 - imageRect.y) / scale);
    if (iy < 0 || iy >= image.height) continue;
    for (let sx = x0; sx < x1; sx++) {
      const ix = Math.floor((sx + 0.5 - imageRect.x) / scale);
      if (ix < 0 || ix >= image.width) continue;
      const i = (iy * image.width + ix) * 4;
      const alpha = src[i + 3];
      if (alpha === 0) continue;
      blendPixel(frame, sx, sy, { r: src[i], g: src[i + 1], b: src[i + 2], a: alpha / 255 });
    }
  }
}

function drawCropOverlay(frame: Bitmap, crop: Rect): void {
  const { width, height } = frame;
  const right = crop.x + crop.width;
  const bottom = crop.y + crop.height;

  const dim = new CoverageMask(width, height);
  dim.addWhere(0, 0, width, height, (cx, cy) => cx < crop.x || cx >= right || cy < crop.y || cy >= bottom);
  dim.paint(frame, { r: 0, g: 0, b: 0, a: CROP_DIM_ALPHA / 255 });

  // Rule of thirds
  const grid = new CoverageMask(width, height);
  for (const t of [1 / 3, 2 / 3]) {
    const gx = crop.x + crop.width * t;
    const gy = crop.y + crop.height * t;
    grid.addSegment({ x: gx, y: crop.y }, { x: gx, y: bottom }, 1);
    grid.addSegment({ x: crop.x, y: gy }, { x: right, y: gy }, 1);
  }
  grid.paint(frame, { r: 255, g: 255, b: 255, a: 128 / 255 });

  const border = new CoverageMask(width, height);
  border.addRectOutline(crop.x, crop.y, right, bottom, CROP_BORDER_WIDTH);
  border.paint(frame, WHITE);

  const midX = crop.x + crop.width / 2;
  const midY = crop.y + crop.height / 2;
  const handles = new CoverageMask(width, height);
  for (const [hx, hy] of [
    [crop.x, crop.y],
    [midX, crop.y],
    [right, crop.y],
    [right, midY],
    [right, bottom],
    [midX, bottom],
    [crop.x, bottom],
    [crop.x, midY],
  ]) {
    handles.addSquare({ x: hx, y: hy }, CROP_HANDLE_SIZE);
  }
  handles.paint(frame, WHITE);
}

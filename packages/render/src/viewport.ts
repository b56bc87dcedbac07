/**
 * @module viewport
 * Mapping between screen space (pixels of the view) and image space
 * (pixels of the bitmap being edited).
 *
 * The image is drawn centred in the view and then shifted by the pan
 * offset. In fit mode the scale is the best fit of the image in the view
 * and pan is ignored.
 *
 * Transform: screenPoint = imagePoint * scale + origin
 * Inverse:   imagePoint  = (screenPoint - origin) / scale
 */

import type { Point, Rect, Size, ViewportState } from '@layerkit/types';
import { clamp } from '@layerkit/core';

function hasArea(size: Size): boolean {
  return size.width > 0 && size.height > 0;
}

/** Scale that fits `imageSize` entirely inside `viewSize`, unclamped. */
function fitScale(imageSize: Size, viewSize: Size): number {
  if (!hasArea(imageSize) || !hasArea(viewSize)) return 1;
  return Math.min(viewSize.width / imageSize.width, viewSize.height / imageSize.height);
}

/**
 * Best-fit zoom for pushing back into the viewport manager while in fit
 * mode, clamped to the zoom bounds.
 */
export function computeFitZoom(imageSize: Size, viewSize: Size, minZoom = 0.1, maxZoom = 10): number {
  return clamp(fitScale(imageSize, viewSize), minZoom, maxZoom);
}

export class ViewportTransform {
  private constructor(
    /** Where the image lands on screen, in screen pixels. */
    readonly imageRect: Rect,
    /** Screen pixels per image pixel. */
    readonly scale: number,
  ) {}

  /** Place an image of `imageSize` in a view of `viewSize` for the given viewport state. */
  static compute(imageSize: Size, viewSize: Size, viewport: ViewportState): ViewportTransform {
    const scale = viewport.isFitMode ? fitScale(imageSize, viewSize) : viewport.zoom;
    const panX = viewport.isFitMode ? 0 : viewport.panX;
    const panY = viewport.isFitMode ? 0 : viewport.panY;

    const width = imageSize.width * scale;
    const height = imageSize.height * scale;
    return new ViewportTransform(
      {
        x: (viewSize.width - width) / 2 + panX,
        y: (viewSize.height - height) / 2 + panY,
        width,
        height,
      },
      scale,
    );
  }

  /** Convert a screen-space point to image space. */
  screenToImage(screenPoint: Point): Point {
    return {
      x: (screenPoint.x - this.imageRect.x) / this.scale,
      y: (screenPoint.y - this.imageRect.y) / this.scale,
    };
  }

  /** Convert an image-space point to screen space. */
  imageToScreen(imagePoint: Point): Point {
    return {
      x: imagePoint.x * this.scale + this.imageRect.x,
      y: imagePoint.y * this.scale + this.imageRect.y,
    };
  }

  /** Convert an image-space rectangle to screen space. */
  imageRectToScreen(rect: Rect): Rect {
    const topLeft = this.imageToScreen(rect);
    return { x: topLeft.x, y: topLeft.y, width: rect.width * this.scale, height: rect.height * this.scale };
  }

  /** True when the screen point lies over the drawn image. */
  containsScreenPoint(screenPoint: Point): boolean {
    const { x, y, width, height } = this.imageRect;
    return screenPoint.x >= x && screenPoint.x < x + width && screenPoint.y >= y && screenPoint.y < y + height;
  }
}

/**
 * @module tools/crop-tool
 * Drag-based crop rectangle editor.
 *
 * The region is kept in image pixels (fractional while dragging) and is
 * always clamped to the image bounds. A drag grabs one of eight handles,
 * the interior (`move`), or starts a new region anchored at the pointer
 * with the bottom-right handle grabbed. Every drag step is computed from
 * the region as it was at pointer-down plus the pointer delta.
 */

import type { CropHandle, CropRegionState, CursorKind, Point, Rect, Size } from '@layerkit/types';
import { DEFAULT_EDITOR_OPTIONS } from '../options';
import { clamp, pointInRect } from '../geometry';

export interface CropToolOptions {
  /** Handle hit radius in screen pixels. */
  handleRadius: number;
  /** Minimum region size as a fraction of each image side. */
  minSizeRatio: number;
}

interface Edges {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

const HANDLE_ORDER: readonly Exclude<CropHandle, 'none' | 'move'>[] = [
  'top-left',
  'top',
  'top-right',
  'right',
  'bottom-right',
  'bottom',
  'bottom-left',
  'left',
];

/** Cursor hint for a crop handle. `none` means a new region would be drawn. */
export function cursorForHandle(handle: CropHandle): CursorKind {
  switch (handle) {
    case 'top-left':
    case 'bottom-right':
      return 'nwse-resize';
    case 'top-right':
    case 'bottom-left':
      return 'nesw-resize';
    case 'top':
    case 'bottom':
      return 'ns-resize';
    case 'left':
    case 'right':
      return 'ew-resize';
    case 'move':
      return 'move';
    case 'none':
      return 'crosshair';
  }
}

function edgesToRect(e: Edges): Rect {
  return { x: e.left, y: e.top, width: e.right - e.left, height: e.bottom - e.top };
}

export class CropTool {
  private readonly options: CropToolOptions;
  private imageWidth = 0;
  private imageHeight = 0;
  private viewScale = 1;

  private edges: Edges | null = null;
  private dragStartEdges: Edges | null = null;
  private dragStartPoint: Point = { x: 0, y: 0 };
  private activeHandle: CropHandle = 'none';

  constructor(options: Partial<CropToolOptions> = {}) {
    this.options = {
      handleRadius: options.handleRadius ?? DEFAULT_EDITOR_OPTIONS.cropHandleRadius,
      minSizeRatio: options.minSizeRatio ?? DEFAULT_EDITOR_OPTIONS.cropMinSizeRatio,
    };
  }

  get hasRegion(): boolean {
    return this.edges !== null;
  }

  get isDragging(): boolean {
    return this.activeHandle !== 'none';
  }

  get imageSize(): Size {
    return { width: this.imageWidth, height: this.imageHeight };
  }

  /** Set the bounds the region is clamped to. Clears any region. */
  setImageSize(width: number, height: number): void {
    this.imageWidth = Math.max(0, width);
    this.imageHeight = Math.max(0, height);
    this.clearRegion();
  }

  /**
   * Screen pixels per image pixel. Handle hit testing happens in image space,
   * so the screen-space radius is divided by this.
   */
  setViewScale(scale: number): void {
    if (scale > 0) this.viewScale = scale;
  }

  clearRegion(): void {
    this.edges = null;
    this.dragStartEdges = null;
    this.activeHandle = 'none';
  }

  /** Replace the region, clamped to the image. Returns false without an image. */
  setRegion(rect: Rect): boolean {
    if (!this.hasImage()) return false;
    const left = clamp(Math.min(rect.x, rect.x + rect.width), 0, this.imageWidth);
    const top = clamp(Math.min(rect.y, rect.y + rect.height), 0, this.imageHeight);
    const right = clamp(Math.max(rect.x, rect.x + rect.width), 0, this.imageWidth);
    const bottom = clamp(Math.max(rect.y, rect.y + rect.height), 0, this.imageHeight);
    this.edges = { left, top, right, bottom };
    return true;
  }

  getState(): CropRegionState | null {
    if (!this.edges) return null;
    return {
      region: edgesToRect(this.edges),
      activeHandle: this.activeHandle,
      isDragging: this.isDragging,
    };
  }

  onPointerDown(point: Point): boolean {
    if (!this.hasImage()) return false;

    this.dragStartPoint = { ...point };

    if (this.edges) {
      const handle = this.hitTest(point);
      if (handle !== 'none') {
        this.activeHandle = handle;
        this.dragStartEdges = { ...this.edges };
        return true;
      }
    }

    if (!pointInRect(point, { x: 0, y: 0, width: this.imageWidth, height: this.imageHeight })) {
      return false;
    }

    const anchor = { left: point.x, top: point.y, right: point.x, bottom: point.y };
    this.edges = anchor;
    this.dragStartEdges = { ...anchor };
    this.activeHandle = 'bottom-right';
    return true;
  }

  onPointerMove(point: Point): boolean {
    if (this.activeHandle === 'none' || !this.dragStartEdges) return false;

    const dx = point.x - this.dragStartPoint.x;
    const dy = point.y - this.dragStartPoint.y;
    const start = this.dragStartEdges;
    const next: Edges = { ...start };

    switch (this.activeHandle) {
      case 'top-left':
        next.left += dx;
        next.top += dy;
        break;
      case 'top':
        next.top += dy;
        break;
      case 'top-right':
        next.right += dx;
        next.top += dy;
        break;
      case 'right':
        next.right += dx;
        break;
      case 'bottom-right':
        next.right += dx;
        next.bottom += dy;
        break;
      case 'bottom':
        next.bottom += dy;
        break;
      case 'bottom-left':
        next.left += dx;
        next.bottom += dy;
        break;
      case 'left':
        next.left += dx;
        break;
      case 'move':
        next.left += dx;
        next.right += dx;
        next.top += dy;
        next.bottom += dy;
        break;
    }

    this.edges = this.constrain(next, this.activeHandle === 'move');
    return true;
  }

  /** Ends the drag. A region that never grew past a point is dropped. */
  onPointerUp(): boolean {
    if (this.activeHandle === 'none') return false;
    this.activeHandle = 'none';
    this.dragStartEdges = null;
    if (this.edges && (this.edges.right <= this.edges.left || this.edges.bottom <= this.edges.top)) {
      this.edges = null;
    }
    return true;
  }

  /** Handle under `point`; `none` when there is no region or nothing is hit. */
  getCursorForPoint(point: Point): CropHandle {
    if (!this.edges) return 'none';
    return this.hitTest(point);
  }

  /** Integer crop rect (edges rounded, clamped to the image); null when empty. */
  getImageCropRect(): Rect | null {
    if (!this.edges) return null;
    const left = clamp(Math.round(this.edges.left), 0, this.imageWidth);
    const top = clamp(Math.round(this.edges.top), 0, this.imageHeight);
    const right = clamp(Math.round(this.edges.right), 0, this.imageWidth);
    const bottom = clamp(Math.round(this.edges.bottom), 0, this.imageHeight);
    if (right <= left || bottom <= top) return null;
    return { x: left, y: top, width: right - left, height: bottom - top };
  }

  /** Region size in whole pixels, at least 1×1 while a region exists. */
  getCropPixelDimensions(): Size {
    if (!this.edges) return { width: 0, height: 0 };
    return {
      width: Math.max(Math.round(this.edges.right - this.edges.left), 1),
      height: Math.max(Math.round(this.edges.bottom - this.edges.top), 1),
    };
  }

  /**
   * Reshape the region to `ratioW:ratioH` around its centre, keeping the
   * side that fits and shrinking the other.
   */
  setAspectRatio(ratioW: number, ratioH: number): boolean {
    if (!this.edges || ratioW <= 0 || ratioH <= 0) return false;
    const cropW = this.edges.right - this.edges.left;
    const cropH = this.edges.bottom - this.edges.top;
    if (cropW <= 0 || cropH <= 0) return false;

    const target = ratioW / ratioH;
    let newW: number;
    let newH: number;
    if (target > cropW / cropH) {
      newW = cropW;
      newH = newW / target;
    } else {
      newH = cropH;
      newW = newH * target;
    }
    newW = Math.max(newW, this.minWidth);
    newH = Math.max(newH, this.minHeight);

    const cx = (this.edges.left + this.edges.right) / 2;
    const cy = (this.edges.top + this.edges.bottom) / 2;
    const shifted = this.shiftIntoBounds({
      left: cx - newW / 2,
      top: cy - newH / 2,
      right: cx + newW / 2,
      bottom: cy + newH / 2,
    });
    this.edges = {
      left: clamp(shifted.left, 0, this.imageWidth),
      top: clamp(shifted.top, 0, this.imageHeight),
      right: clamp(shifted.right, 0, this.imageWidth),
      bottom: clamp(shifted.bottom, 0, this.imageHeight),
    };
    return true;
  }

  /** Swap the region's orientation (W:H becomes H:W). */
  switchAspectRatio(): boolean {
    if (!this.edges) return false;
    const { width, height } = this.getCropPixelDimensions();
    return this.setAspectRatio(height, width);
  }

  /** Grow the region to the largest centred rect of the same aspect. */
  fitToImage(): boolean {
    if (!this.edges) return false;
    const cropW = this.edges.right - this.edges.left;
    const cropH = this.edges.bottom - this.edges.top;
    if (cropW <= 0 || cropH <= 0) return false;

    const aspect = cropW / cropH;
    let newW = this.imageWidth;
    let newH = newW / aspect;
    if (newH > this.imageHeight) {
      newH = this.imageHeight;
      newW = newH * aspect;
    }
    const left = (this.imageWidth - newW) / 2;
    const top = (this.imageHeight - newH) / 2;
    this.edges = { left, top, right: left + newW, bottom: top + newH };
    return true;
  }

  private hasImage(): boolean {
    return this.imageWidth > 0 && this.imageHeight > 0;
  }

  private get minWidth(): number {
    return Math.max(1, this.imageWidth * this.options.minSizeRatio);
  }

  private get minHeight(): number {
    return Math.max(1, this.imageHeight * this.options.minSizeRatio);
  }

  private hitTest(point: Point): CropHandle {
    if (!this.edges) return 'none';
    const { left, top, right, bottom } = this.edges;
    const midX = (left + right) / 2;
    const midY = (top + bottom) / 2;
    const positions: Record<(typeof HANDLE_ORDER)[number], Point> = {
      'top-left': { x: left, y: top },
      top: { x: midX, y: top },
      'top-right': { x: right, y: top },
      right: { x: right, y: midY },
      'bottom-right': { x: right, y: bottom },
      bottom: { x: midX, y: bottom },
      'bottom-left': { x: left, y: bottom },
      left: { x: left, y: midY },
    };

    const radius = this.options.handleRadius / this.viewScale;
    const r2 = radius * radius;
    for (const handle of HANDLE_ORDER) {
      const h = positions[handle];
      const dx = point.x - h.x;
      const dy = point.y - h.y;
      if (dx * dx + dy * dy <= r2) return handle;
    }

    return pointInRect(point, edgesToRect(this.edges)) ? 'move' : 'none';
  }

  private constrain(edges: Edges, moving: boolean): Edges {
    let { left, top, right, bottom } = edges;
    if (left > right) [left, right] = [right, left];
    if (top > bottom) [top, bottom] = [bottom, top];

    const minW = this.minWidth;
    const minH = this.minHeight;
    if (right - left < minW) right = left + minW;
    if (bottom - top < minH) bottom = top + minH;

    if (moving) return this.shiftIntoBounds({ left, top, right, bottom });

    return {
      left: clamp(left, 0, this.imageWidth - minW),
      right: clamp(right, minW, this.imageWidth),
      top: clamp(top, 0, this.imageHeight - minH),
      bottom: clamp(bottom, minH, this.imageHeight),
    };
  }

  private shiftIntoBounds(edges: Edges): Edges {
    let { left, top, right, bottom } = edges;
    const width = right - left;
    const height = bottom - top;
    if (left < 0) {
      left = 0;
      right = width;
    }
    if (right > this.imageWidth) {
      right = this.imageWidth;
      left = this.imageWidth - width;
    }
    if (top < 0) {
      top = 0;
      bottom = height;
    }
    if (bottom > this.imageHeight) {
      bottom = this.imageHeight;
      top = this.imageHeight - height;
    }
    return { left, top, right, bottom };
  }
}

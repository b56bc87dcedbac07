/**
 * @module raster
 * Software rasterizer for brush strokes and parametric shapes.
 *
 * Geometry is first accumulated into a binary {@link CoverageMask} (a pixel
 * is covered when its centre lies inside the shape) and the mask is then
 * blended once, source-over, with the paint color. Painting through a mask
 * keeps overlapping dabs of a translucent stroke from darkening where they
 * overlap.
 */

import type { Bitmap, BrushShape, Color, DrawingStroke, Point, ShapeDescriptor } from '@layerkit/types';
import { blendPixel } from './bitmap';
import { rectFromPoints } from './geometry';

/** Binary per-pixel coverage over a bitmap-sized grid. */
export class CoverageMask {
  readonly bits: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.bits = new Uint8Array(width * height);
  }

  get coveredCount(): number {
    let n = 0;
    for (const b of this.bits) n += b;
    return n;
  }

  isCovered(x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return false;
    return this.bits[y * this.width + x] === 1;
  }

  /**
   * Mark every pixel in the bounding box whose centre passes `inside`.
   * The box is clipped to the grid.
   */
  addWhere(minX: number, minY: number, maxX: number, maxY: number, inside: (cx: number, cy: number) => boolean): void {
    const x0 = Math.max(0, Math.floor(minX));
    const y0 = Math.max(0, Math.floor(minY));
    const x1 = Math.min(this.width - 1, Math.ceil(maxX));
    const y1 = Math.min(this.height - 1, Math.ceil(maxY));
    for (let y = y0; y <= y1; y++) {
      for (let x = x0; x <= x1; x++) {
        if (inside(x + 0.5, y + 0.5)) this.bits[y * this.width + x] = 1;
      }
    }
  }

  /** Disc of the given diameter. The pixel under `center` is always covered. */
  addCircle(center: Point, diameter: number): void {
    const r = diameter / 2;
    const r2 = r * r;
    this.addWhere(center.x - r, center.y - r, center.x + r, center.y + r, (cx, cy) => {
      const dx = cx - center.x;
      const dy = cy - center.y;
      return dx * dx + dy * dy <= r2;
    });
    const px = Math.floor(center.x);
    const py = Math.floor(center.y);
    this.addWhere(px, py, px, py, () => true);
  }

  /** Axis-aligned square of the given side, centred on `center`. */
  addSquare(center: Point, side: number): void {
    const h = side / 2;
    this.addRect(center.x - h, center.y - h, center.x + h, center.y + h);
  }

  /** Half-open rect `[x0, x1) × [y0, y1)` tested at pixel centres. */
  addRect(x0: number, y0: number, x1: number, y1: number): void {
    this.addWhere(x0, y0, x1, y1, (cx, cy) => cx >= x0 && cx < x1 && cy >= y0 && cy < y1);
  }

  /** Rectangular ring of `strokeWidth` centred on the rect edges. */
  addRectOutline(x0: number, y0: number, x1: number, y1: number, strokeWidth: number): void {
    const h = strokeWidth / 2;
    const ix0 = x0 + h;
    const iy0 = y0 + h;
    const ix1 = x1 - h;
    const iy1 = y1 - h;
    this.addWhere(x0 - h, y0 - h, x1 + h, y1 + h, (cx, cy) => {
      const inOuter = cx >= x0 - h && cx < x1 + h && cy >= y0 - h && cy < y1 + h;
      const inInner = cx >= ix0 && cx < ix1 && cy >= iy0 && cy < iy1;
      return inOuter && !inInner;
    });
  }

  /** Filled ellipse inscribed in the rect. */
  addEllipse(x0: number, y0: number, x1: number, y1: number): void {
    const rx = (x1 - x0) / 2;
    const ry = (y1 - y0) / 2;
    if (rx <= 0 || ry <= 0) return;
    const cx0 = x0 + rx;
    const cy0 = y0 + ry;
    this.addWhere(x0, y0, x1, y1, (cx, cy) => ellipseValue(cx, cy, cx0, cy0, rx, ry) <= 1);
  }

  /** Elliptical ring of `strokeWidth` centred on the ellipse inscribed in the rect. */
  addEllipseOutline(x0: number, y0: number, x1: number, y1: number, strokeWidth: number): void {
    const rx = (x1 - x0) / 2;
    const ry = (y1 - y0) / 2;
    const h = strokeWidth / 2;
    const cx0 = x0 + rx;
    const cy0 = y0 + ry;
    const orx = rx + h;
    const ory = ry + h;
    const irx = rx - h;
    const iry = ry - h;
    this.addWhere(cx0 - orx, cy0 - ory, cx0 + orx, cy0 + ory, (cx, cy) => {
      if (ellipseValue(cx, cy, cx0, cy0, orx, ory) > 1) return false;
      if (irx <= 0 || iry <= 0) return true;
      return ellipseValue(cx, cy, cx0, cy0, irx, iry) > 1;
    });
  }

  /** Thick segment with round caps. */
  addSegment(a: Point, b: Point, width: number): void {
    const h = Math.max(width / 2, 0.5);
    const h2 = h * h;
    this.addWhere(
      Math.min(a.x, b.x) - h,
      Math.min(a.y, b.y) - h,
      Math.max(a.x, b.x) + h,
      Math.max(a.y, b.y) + h,
      (cx, cy) => distanceSqToSegment(cx, cy, a, b) <= h2,
    );
  }

  /** Square dabs stamped along a segment at half-pixel spacing. */
  addSquareSegment(a: Point, b: Point, side: number): void {
    const length = Math.hypot(b.x - a.x, b.y - a.y);
    const steps = Math.max(1, Math.ceil(length * 2));
    for (let i = 0; i <= steps; i++) {
      const t = i / steps;
      this.addSquare({ x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t }, side);
    }
  }

  /** Filled triangle (either winding). */
  addTriangle(p0: Point, p1: Point, p2: Point): void {
    const area = edge(p0, p1, p2.x, p2.y);
    if (area === 0) return;
    const sign = area > 0 ? 1 : -1;
    this.addWhere(
      Math.min(p0.x, p1.x, p2.x),
      Math.min(p0.y, p1.y, p2.y),
      Math.max(p0.x, p1.x, p2.x),
      Math.max(p0.y, p1.y, p2.y),
      (cx, cy) =>
        sign * edge(p0, p1, cx, cy) >= 0 &&
        sign * edge(p1, p2, cx, cy) >= 0 &&
        sign * edge(p2, p0, cx, cy) >= 0,
    );
  }

  /** Blend `color` into every covered pixel of `target`. */
  paint(target: Bitmap, color: Color): void {
    const w = Math.min(this.width, target.width);
    const h = Math.min(this.height, target.height);
    for (let y = 0; y < h; y++) {
      for (let x = 0; x < w; x++) {
        if (this.bits[y * this.width + x] === 1) blendPixel(target, x, y, color);
      }
    }
  }
}

function ellipseValue(x: number, y: number, cx: number, cy: number, rx: number, ry: number): number {
  const nx = (x - cx) / rx;
  const ny = (y - cy) / ry;
  return nx * nx + ny * ny;
}

function edge(a: Point, b: Point, x: number, y: number): number {
  return (b.x - a.x) * (y - a.y) - (b.y - a.y) * (x - a.x);
}

function distanceSqToSegment(px: number, py: number, a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const len2 = dx * dx + dy * dy;
  let t = len2 === 0 ? 0 : ((px - a.x) * dx + (py - a.y) * dy) / len2;
  t = Math.max(0, Math.min(1, t));
  const qx = a.x + t * dx - px;
  const qy = a.y + t * dy - py;
  return qx * qx + qy * qy;
}

/** Coverage of a freehand stroke: dabs at every point joined by thick segments. */
export function strokeCoverage(
  width: number,
  height: number,
  points: readonly Point[],
  size: number,
  shape: BrushShape,
): CoverageMask {
  const mask = new CoverageMask(width, height);
  if (points.length === 0) return mask;

  if (points.length === 1) {
    if (shape === 'round') mask.addCircle(points[0], size);
    else mask.addSquare(points[0], size);
    return mask;
  }

  for (let i = 1; i < points.length; i++) {
    if (shape === 'round') mask.addSegment(points[i - 1], points[i], size);
    else mask.addSquareSegment(points[i - 1], points[i], size);
  }
  return mask;
}

/** Paint a freehand stroke into `target`. */
export function rasterizeStroke(target: Bitmap, stroke: DrawingStroke): void {
  strokeCoverage(target.width, target.height, stroke.points, stroke.size, stroke.shape).paint(
    target,
    stroke.color,
  );
}

/** Arrow head geometry for a shaft of the given stroke width. */
export interface ArrowHead {
  tip: Point;
  left: Point;
  right: Point;
  /** End of the shaft, where the head's base starts. */
  base: Point;
}

/**
 * Head length is `max(3w, 12)` capped at 40 % of the arrow length; head
 * half-width is `max(2w, 8)` capped at 0.7 × head length.
 */
export function arrowHead(start: Point, end: Point, strokeWidth: number): ArrowHead | null {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const length = Math.hypot(dx, dy);
  if (length === 0) return null;

  const ux = dx / length;
  const uy = dy / length;
  const headLength = Math.min(Math.max(strokeWidth * 3, 12), length * 0.4);
  const halfWidth = Math.min(Math.max(strokeWidth * 2, 8), headLength * 0.7);
  const base = { x: end.x - ux * headLength, y: end.y - uy * headLength };
  return {
    tip: { ...end },
    base,
    left: { x: base.x - uy * halfWidth, y: base.y + ux * halfWidth },
    right: { x: base.x + uy * halfWidth, y: base.y - ux * halfWidth },
  };
}

/** Paint a parametric shape into `target`. */
export function rasterizeShape(target: Bitmap, shape: ShapeDescriptor): void {
  const { width, height } = target;
  const { start, end, strokeWidth } = shape;
  const box = rectFromPoints(start, end);
  const x1 = box.x + box.width;
  const y1 = box.y + box.height;
  const fills = shape.fillMode !== 'stroke';
  const strokes = shape.fillMode !== 'fill';

  switch (shape.type) {
    case 'rectangle': {
      if (fills) {
        const fill = new CoverageMask(width, height);
        fill.addRect(box.x, box.y, x1, y1);
        fill.paint(target, shape.fillColor);
      }
      if (strokes) {
        const outline = new CoverageMask(width, height);
        outline.addRectOutline(box.x, box.y, x1, y1, strokeWidth);
        outline.paint(target, shape.strokeColor);
      }
      return;
    }
    case 'ellipse': {
      if (fills) {
        const fill = new CoverageMask(width, height);
        fill.addEllipse(box.x, box.y, x1, y1);
        fill.paint(target, shape.fillColor);
      }
      if (strokes) {
        const outline = new CoverageMask(width, height);
        outline.addEllipseOutline(box.x, box.y, x1, y1, strokeWidth);
        outline.paint(target, shape.strokeColor);
      }
      return;
    }
    case 'cross': {
      const mask = new CoverageMask(width, height);
      mask.addSegment({ x: box.x, y: box.y }, { x: x1, y: y1 }, strokeWidth);
      mask.addSegment({ x: x1, y: box.y }, { x: box.x, y: y1 }, strokeWidth);
      mask.paint(target, shape.strokeColor);
      return;
    }
    case 'line': {
      const mask = new CoverageMask(width, height);
      mask.addSegment(start, end, strokeWidth);
      mask.paint(target, shape.strokeColor);
      return;
    }
    case 'arrow': {
      const head = arrowHead(start, end, strokeWidth);
      if (!head) return;
      const mask = new CoverageMask(width, height);
      mask.addSegment(start, head.base, strokeWidth);
      mask.addTriangle(head.tip, head.left, head.right);
      mask.paint(target, shape.strokeColor);
      return;
    }
  }
}

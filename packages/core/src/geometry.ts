/**
 * @module geometry
 * Small point / rect helpers shared by the interactive tools.
 */

import type { Point, Rect } from '@layerkit/types';

/** tan(22.5°): below this slope a drag snaps to the nearest axis. */
const AXIS_SNAP_SLOPE = Math.tan(Math.PI / 8);

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Normalized rect spanning two corner points. */
export function rectFromPoints(a: Point, b: Point): Rect {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return { x, y, width: Math.abs(b.x - a.x), height: Math.abs(b.y - a.y) };
}

/**
 * Snap `current` so the segment from `start` is horizontal, vertical or at
 * 45°, whichever is nearest. Diagonals use the longer of the two deltas.
 */
export function snapToAngle(start: Point, current: Point): Point {
  const dx = current.x - start.x;
  const dy = current.y - start.y;
  const adx = Math.abs(dx);
  const ady = Math.abs(dy);

  if (ady <= adx * AXIS_SNAP_SLOPE) return { x: current.x, y: start.y };
  if (adx <= ady * AXIS_SNAP_SLOPE) return { x: start.x, y: current.y };

  const size = Math.max(adx, ady);
  return { x: start.x + Math.sign(dx) * size, y: start.y + Math.sign(dy) * size };
}

/**
 * Force equal width and height using the larger delta, keeping the drag
 * direction on each axis.
 */
export function constrainToSquare(start: Point, current: Point): Point {
  const dx = current.x - start.x;
  const dy = current.y - start.y;
  const size = Math.max(Math.abs(dx), Math.abs(dy));
  return {
    x: start.x + (dx >= 0 ? size : -size),
    y: start.y + (dy >= 0 ? size : -size),
  };
}

export function pointInRect(p: Point, r: Rect): boolean {
  return p.x >= r.x && p.x <= r.x + r.width && p.y >= r.y && p.y <= r.y + r.height;
}

/**
 * @module viewport
 * Zoom / pan state shared by the viewport manager and the renderer.
 */

/** Snapshot of the viewport, published with every viewport change. */
export interface ViewportState {
  /** Zoom factor, always within the configured bounds. */
  zoom: number;
  /** Whether zoom tracks the best fit of the image in the view. */
  isFitMode: boolean;
  /** Horizontal pan offset in screen pixels. Zero in fit mode. */
  panX: number;
  /** Vertical pan offset in screen pixels. Zero in fit mode. */
  panY: number;
}

/**
 * @module viewport-manager
 * Owns zoom, pan and fit mode, and publishes `viewport:changed` whenever the
 * observable state actually changes.
 *
 * Fit mode does not compute a zoom itself: the renderer works out the best
 * fit for the current image and view size and pushes it back through
 * {@link ViewportManager.setFitModeWithZoom}.
 *
 * Invariants: `minZoom <= zoom <= maxZoom`; pan is (0, 0) while in fit mode.
 */

import type { EventBus, ViewportState } from '@layerkit/types';
import { clamp } from './geometry';
import type { EditorOptions } from './options';
import { DEFAULT_EDITOR_OPTIONS } from './options';

/** Zoom differences below this are treated as "unchanged". */
const ZOOM_EPSILON = 0.0001;

/** Round away floating-point drift from repeated step additions. */
function roundZoom(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export type ViewportOptions = Pick<EditorOptions, 'minZoom' | 'maxZoom' | 'zoomStep'>;

export class ViewportManager {
  private state: ViewportState = { zoom: 1, isFitMode: true, panX: 0, panY: 0 };
  private readonly options: ViewportOptions;

  constructor(
    private readonly bus: EventBus,
    options: Partial<ViewportOptions> = {},
  ) {
    this.options = {
      minZoom: options.minZoom ?? DEFAULT_EDITOR_OPTIONS.minZoom,
      maxZoom: options.maxZoom ?? DEFAULT_EDITOR_OPTIONS.maxZoom,
      zoomStep: options.zoomStep ?? DEFAULT_EDITOR_OPTIONS.zoomStep,
    };
  }

  get zoom(): number {
    return this.state.zoom;
  }

  get isFitMode(): boolean {
    return this.state.isFitMode;
  }

  get panX(): number {
    return this.state.panX;
  }

  get panY(): number {
    return this.state.panY;
  }

  get minZoom(): number {
    return this.options.minZoom;
  }

  get maxZoom(): number {
    return this.options.maxZoom;
  }

  /** Copy of the current state. */
  getState(): ViewportState {
    return { ...this.state };
  }

  /** Set an explicit zoom (clamped). Leaves fit mode; pan is kept. */
  setZoom(zoom: number): void {
    this.update({ ...this.state, zoom: this.clampZoom(zoom), isFitMode: false });
  }

  zoomIn(): void {
    this.setZoom(roundZoom(this.state.zoom + this.options.zoomStep));
  }

  zoomOut(): void {
    this.setZoom(roundZoom(this.state.zoom - this.options.zoomStep));
  }

  /** Enter fit mode; the renderer supplies the numeric zoom later. */
  zoomToFit(): void {
    this.update({ ...this.state, isFitMode: true, panX: 0, panY: 0 });
  }

  /** Renderer push-back: record the computed fit zoom and stay in fit mode. */
  setFitModeWithZoom(zoom: number): void {
    this.update({ zoom: this.clampZoom(zoom), isFitMode: true, panX: 0, panY: 0 });
  }

  /** 100 % zoom, centred, fit mode off. */
  zoomToActual(): void {
    this.update({ zoom: 1, isFitMode: false, panX: 0, panY: 0 });
  }

  /** Shift the pan offset by screen pixels. Ignored in fit mode. */
  pan(dx: number, dy: number): void {
    if (this.state.isFitMode) return;
    this.update({ ...this.state, panX: this.state.panX + dx, panY: this.state.panY + dy });
  }

  /** Set the pan offset directly. Ignored in fit mode. */
  setPan(panX: number, panY: number): void {
    if (this.state.isFitMode) return;
    this.update({ ...this.state, panX, panY });
  }

  /** Back to the initial state: zoom 1, no pan, fit mode on. */
  reset(): void {
    this.update({ zoom: 1, isFitMode: true, panX: 0, panY: 0 });
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private clampZoom(zoom: number): number {
    return clamp(zoom, this.options.minZoom, this.options.maxZoom);
  }

  /** Apply `next` and publish exactly once, or do nothing if it is the same state. */
  private update(next: ViewportState): void {
    const prev = this.state;
    const zoomChanged = Math.abs(next.zoom - prev.zoom) >= ZOOM_EPSILON;
    const changed =
      zoomChanged ||
      next.isFitMode !== prev.isFitMode ||
      next.panX !== prev.panX ||
      next.panY !== prev.panY;
    if (!changed) return;

    this.state = { ...next, zoom: zoomChanged ? next.zoom : prev.zoom };
    this.bus.emit('viewport:changed', this.getState());
  }
}

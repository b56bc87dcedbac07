/**
 * @module layer-manager
 * Facade over {@link LayerStack} that owns layer mode and publishes layer
 * events on the {@link EventBus}.
 *
 * Every operation is a silent no-op (returning `false` / `null`) while layer
 * mode is off, and every event is published after the stack invariants hold
 * again. Layers passed in are matched by identity against the stack; a
 * layer from elsewhere is ignored. Layers come out as the read-only
 * {@link Layer} view, so every property or buffer change goes through here.
 */

import type { Bitmap, EventBus, Layer, LayerChangeType, Rect } from '@layerkit/types';
import { LayerImpl } from './layer';
import { LayerStack } from './layer-stack';

export class LayerManager {
  private stack: LayerStack | null = null;

  constructor(private readonly bus: EventBus) {}

  get isLayerMode(): boolean {
    return this.stack !== null;
  }

  /** Layers bottom-to-top, empty when layer mode is off. */
  get layers(): readonly Layer[] {
    return this.stack?.layers ?? [];
  }

  get count(): number {
    return this.stack?.count ?? 0;
  }

  get activeLayer(): Layer | null {
    return this.stack?.activeLayer ?? null;
  }

  get width(): number {
    return this.stack?.width ?? 0;
  }

  get height(): number {
    return this.stack?.height ?? 0;
  }

  indexOf(layer: Layer): number {
    return this.stack?.indexOf(layer) ?? -1;
  }

  /**
   * Start layer mode with one layer wrapping `bitmap`. Ownership of the
   * bitmap transfers to the new layer.
   * @returns `false` when layer mode is already on.
   */
  enableLayerMode(bitmap: Bitmap, name = 'Background'): boolean {
    if (this.stack) return false;

    const stack = new LayerStack(bitmap.width, bitmap.height);
    const layer = stack.insertLayer(0, new LayerImpl(name, bitmap));
    this.stack = stack;

    this.bus.emit('layer:mode-changed', { enabled: true });
    this.publishStructure('added', layer);
    this.bus.emit('layer:active-changed', { previous: null, current: layer });
    return true;
  }

  /**
   * Flatten the stack, tear it down and hand the composite to the caller,
   * who then owns it.
   */
  disableLayerMode(): Bitmap | null {
    const stack = this.stack;
    if (!stack) return null;

    const flattened = stack.flatten();
    this.teardown(stack);
    return flattened;
  }

  /** Tear the stack down without flattening. */
  resetLayerMode(): void {
    if (this.stack) this.teardown(this.stack);
  }

  /** Add a transparent layer on top ("Layer N" when unnamed). It becomes active. */
  addLayer(name?: string): Layer | null {
    const stack = this.stack;
    if (!stack) return null;
    const previous = stack.activeLayer;
    const layer = stack.addLayer(name);
    this.publishStructure('added', layer);
    this.publishActiveIfChanged(previous);
    return layer;
  }

  /** Add a layer holding a copy of `bitmap`. The caller keeps its bitmap. */
  addLayerFromBitmap(bitmap: Bitmap, name?: string): Layer | null {
    const stack = this.stack;
    if (!stack || bitmap.width !== stack.width || bitmap.height !== stack.height) return null;
    const previous = stack.activeLayer;
    const layer = stack.addLayerFromBitmap(bitmap, name);
    this.publishStructure('added', layer);
    this.publishActiveIfChanged(previous);
    return layer;
  }

  /** Remove and dispose a layer. Refuses to remove the last one. */
  removeLayer(layer: Layer): boolean {
    const stack = this.stack;
    const member = stack?.find(layer);
    if (!stack || !member) return false;
    const previous = stack.activeLayer;
    if (!stack.removeLayer(member)) return false;
    this.publishStructure('removed', member);
    this.publishActiveIfChanged(previous);
    return true;
  }

  /** Copy a layer directly above itself; the copy becomes active. */
  duplicateLayer(layer: Layer): Layer | null {
    const stack = this.stack;
    const member = stack?.find(layer);
    if (!stack || !member) return null;
    const previous = stack.activeLayer;
    const copy = stack.duplicateLayer(member);
    if (!copy) return null;
    this.publishStructure('duplicated', copy);
    this.publishActiveIfChanged(previous);
    return copy;
  }

  moveLayerUp(layer: Layer): boolean {
    const member = this.stack?.find(layer);
    if (!member || !this.stack?.moveLayerUp(member)) return false;
    this.publishStructure('reordered', member);
    return true;
  }

  moveLayerDown(layer: Layer): boolean {
    const member = this.stack?.find(layer);
    if (!member || !this.stack?.moveLayerDown(member)) return false;
    this.publishStructure('reordered', member);
    return true;
  }

  /**
   * Merge a layer into the one below it. The event carries the layer that
   * received the pixels, which is now active.
   */
  mergeLayerDown(layer: Layer): boolean {
    const stack = this.stack;
    const member = stack?.find(layer);
    if (!stack || !member) return false;
    const previous = stack.activeLayer;
    const target = stack.mergeDown(member);
    if (!target) return false;
    this.publishStructure('merged-down', target);
    this.publishActiveIfChanged(previous);
    return true;
  }

  /** Collapse the stack into one "Merged" layer of the visible content. */
  mergeVisibleLayers(): boolean {
    const stack = this.stack;
    if (!stack) return false;
    const previous = stack.activeLayer;
    const merged = stack.mergeVisible();
    this.publishStructure('merged-visible', merged);
    this.publishActiveIfChanged(previous);
    return true;
  }

  /** Read-only composite for preview or export. The caller owns the result. */
  flatten(): Bitmap | null {
    return this.stack?.flatten() ?? null;
  }

  /** Replace the stack with one layer holding the composite; layer mode stays on. */
  flattenAllLayers(): boolean {
    const stack = this.stack;
    if (!stack) return false;
    const previous = stack.activeLayer;
    const flattened = stack.flattenAll();
    this.publishStructure('flattened', flattened);
    this.publishActiveIfChanged(previous);
    return true;
  }

  /**
   * Composite with `substitute` drawn in place of the active layer, or
   * `null` when there is no active layer.
   */
  flattenWithActiveSubstitute(substitute: Bitmap): Bitmap | null {
    const active = this.stack?.activeLayer;
    if (!this.stack || !active) return null;
    return this.stack.flattenWithSubstitute(active, substitute);
  }

  /** Select the layer that receives strokes, shapes and adjustments. */
  setActiveLayer(layer: Layer): boolean {
    const stack = this.stack;
    const member = stack?.find(layer);
    if (!stack || !member) return false;
    const previous = stack.activeLayer;
    if (previous === member) return false;
    stack.setActiveLayer(member);
    this.bus.emit('layer:active-changed', { previous, current: member });
    return true;
  }

  setLayerVisibility(layer: Layer, visible: boolean): boolean {
    const member = this.stack?.find(layer);
    if (!member || member.visible === visible) return false;
    member.visible = visible;
    this.bus.emit('layer:content-changed', { layer: member });
    return true;
  }

  /** Set opacity (clamped to 0..1). Changes below 0.001 are ignored. */
  setLayerOpacity(layer: Layer, opacity: number): boolean {
    const member = this.stack?.find(layer);
    if (!member) return false;
    const before = member.opacity;
    member.opacity = opacity;
    if (member.opacity === before) return false;
    this.bus.emit('layer:content-changed', { layer: member });
    return true;
  }

  renameLayer(layer: Layer, name: string): boolean {
    const member = this.stack?.find(layer);
    const trimmed = name.trim();
    if (!member || trimmed === '' || member.name === trimmed) return false;
    member.name = trimmed;
    this.bus.emit('layer:property-changed', { layer: member, property: 'name' });
    return true;
  }

  setLayerLocked(layer: Layer, locked: boolean): boolean {
    const member = this.stack?.find(layer);
    if (!member || member.locked === locked) return false;
    member.locked = locked;
    this.bus.emit('layer:property-changed', { layer: member, property: 'locked' });
    return true;
  }

  /**
   * Hand `bitmap` to a layer in place of its buffer. Refused for locked
   * layers and for bitmaps that differ from the stack size.
   */
  replaceLayerBitmap(layer: Layer, bitmap: Bitmap): boolean {
    const stack = this.stack;
    const member = stack?.find(layer);
    if (!stack || !member || !member.canEdit) return false;
    if (bitmap.width !== stack.width || bitmap.height !== stack.height) return false;
    member.replaceBitmap(bitmap);
    this.bus.emit('layer:content-changed', { layer: member });
    return true;
  }

  /** Publish a content change after a layer's pixels were edited in place. */
  notifyLayerContentChanged(layer: Layer): void {
    const member = this.stack?.find(layer);
    if (member) this.bus.emit('layer:content-changed', { layer: member });
  }

  /** Crop every layer to `rect`; the stack adopts the new size. */
  cropAll(rect: Rect): boolean {
    const stack = this.stack;
    if (!stack || !stack.cropAll(rect)) return false;
    this.publishAllContentChanged(stack);
    return true;
  }

  /** Apply a size-uniform transform (rotate, flip) to every layer. */
  transformAll(transform: (bitmap: Bitmap) => Bitmap): boolean {
    const stack = this.stack;
    if (!stack) return false;
    stack.transformAll(transform);
    this.publishAllContentChanged(stack);
    return true;
  }

  /** Release every layer buffer. */
  dispose(): void {
    this.stack?.dispose();
    this.stack = null;
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private teardown(stack: LayerStack): void {
    const previous = stack.activeLayer;
    stack.dispose();
    this.stack = null;
    this.bus.emit('layer:mode-changed', { enabled: false });
    if (previous) {
      this.bus.emit('layer:active-changed', { previous, current: null });
    }
  }

  private publishStructure(kind: LayerChangeType, layer: Layer | null): void {
    this.bus.emit('layer:structure-changed', { kind, layer });
  }

  private publishActiveIfChanged(previous: Layer | null): void {
    const current = this.stack?.activeLayer ?? null;
    if (current !== previous) {
      this.bus.emit('layer:active-changed', { previous, current });
    }
  }

  private publishAllContentChanged(stack: LayerStack): void {
    for (const layer of stack.layers) {
      this.bus.emit('layer:content-changed', { layer });
    }
  }
}

/**
 * @module events
 * Type-safe event bus definitions for cross-module communication.
 * All inter-module communication should go through the EventBus.
 */

import type { Layer, LayerChangeType, LayerProperty } from './layer';
import type { DrawingStroke, ShapeDescriptor } from './tools';
import type { ViewportState } from './viewport';

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired when a new image is loaded into the editor. */
  'image:loaded': { path: string | null; width: number; height: number };
  /** Fired after the flattened image was written to disk. */
  'image:saved': { path: string };
  /** Fired when pixels or dimensions changed; the renderer should redraw. */
  'image:changed': undefined;
  /** Fired when the unsaved-changes flag flips. */
  'document:dirty': { isDirty: boolean };
  /** Fired when zoom, pan or fit mode changes. */
  'viewport:changed': ViewportState;
  /** Fired when the active tool changes. `null` means no tool. */
  'tool:changed': { previous: string | null; current: string | null };
  /** Fired once per tool whose options panel should open or close. */
  'tool:panel-toggled': { toolId: string; isActive: boolean };
  /** Fired when layers are added, removed, reordered, merged or flattened. */
  'layer:structure-changed': { kind: LayerChangeType; layer: Layer | null };
  /** Fired when a layer's pixels, visibility or opacity change. */
  'layer:content-changed': { layer: Layer };
  /** Fired when a layer's name or lock state changes. */
  'layer:property-changed': { layer: Layer; property: LayerProperty };
  /** Fired when the active layer changes. */
  'layer:active-changed': { previous: Layer | null; current: Layer | null };
  /** Fired when layer mode is turned on or off. */
  'layer:mode-changed': { enabled: boolean };
  /** Fired when a freehand stroke is released, for the host to bake. */
  'drawing:stroke-completed': DrawingStroke;
  /** Fired when a shape drag is released, for the host to bake. */
  'shape:completed': ShapeDescriptor;
  /** Fired with a short human-readable status line. */
  'status:message': { message: string };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/**
 * Type-safe event bus for synchronous pub/sub communication.
 *
 * Delivery is synchronous and in subscription order. A listener that throws
 * aborts delivery to the listeners after it and the error propagates to the
 * caller of `emit`.
 */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Number of listeners currently registered for `event`. */
  listenerCount<K extends keyof EventMap>(event: K): number;
  /** Remove all listeners for all events. */
  clear(): void;
}

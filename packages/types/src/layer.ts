/**
 * @module layer
 * Layer contracts for the layer stack.
 */

import type { Bitmap } from './bitmap';

/**
 * Read-only view of one named pixel buffer inside a layer stack.
 *
 * Properties change only through the layer manager, which keeps every layer
 * at the stack size and publishes the matching events. The pixels behind
 * `bitmap` may be edited in place, followed by
 * `notifyLayerContentChanged`.
 */
export interface Layer {
  /** Unique identifier (UUID v4). */
  readonly id: string;
  readonly name: string;
  /** Whether the layer takes part in compositing. */
  readonly visible: boolean;
  /** Opacity from 0 (transparent) to 1 (opaque). */
  readonly opacity: number;
  /** Locked layers refuse pixel edits. */
  readonly locked: boolean;
  /** The owned pixel buffer. Throws once the layer is disposed. */
  readonly bitmap: Bitmap;
  readonly width: number;
  readonly height: number;
  /** True when the layer is neither locked nor disposed. */
  readonly canEdit: boolean;
  readonly isDisposed: boolean;
}

/** Kind of structural change reported by the layer manager. */
export type LayerChangeType =
  | 'added'
  | 'removed'
  | 'duplicated'
  | 'reordered'
  | 'merged-down'
  | 'merged-visible'
  | 'flattened';

/** Layer property that changed without altering stack structure. */
export type LayerProperty = 'name' | 'visible' | 'opacity' | 'locked';

/**
 * @module tool-manager
 * Mutual exclusion between interactive tools.
 *
 * At most one tool id is active. Activating another tool first runs the
 * current tool's deactivation callback (if one is registered), then marks
 * the new tool active and publishes `tool:changed` followed by
 * `tool:panel-toggled` for the old tool (off) and the new tool (on).
 */

import type { EventBus } from '@layerkit/types';

/** Tool ids used by the editor. Hosts may register additional ids. */
export const ToolIds = {
  Crop: 'crop',
  Drawing: 'drawing',
  BrightnessContrast: 'brightness-contrast',
  ColorBalance: 'color-balance',
} as const;

function assertToolId(toolId: string): void {
  if (toolId.trim() === '') {
    throw new Error('Tool id must be a non-empty string');
  }
}

export class ToolManager {
  private readonly deactivationCallbacks = new Map<string, () => void>();
  private _activeToolId: string | null = null;

  constructor(private readonly bus: EventBus) {}

  get activeToolId(): string | null {
    return this._activeToolId;
  }

  isActive(toolId: string): boolean {
    return this._activeToolId === toolId;
  }

  /**
   * Make `toolId` the active tool. No-op when it already is.
   * @throws Error for a blank id.
   */
  activate(toolId: string): void {
    assertToolId(toolId);
    const previous = this._activeToolId;
    if (previous === toolId) return;

    if (previous !== null) {
      this.runDeactivation(previous);
    }
    this._activeToolId = toolId;

    this.bus.emit('tool:changed', { previous, current: toolId });
    if (previous !== null) {
      this.bus.emit('tool:panel-toggled', { toolId: previous, isActive: false });
    }
    this.bus.emit('tool:panel-toggled', { toolId, isActive: true });
  }

  /** Deactivate `toolId` if it is the active tool; otherwise do nothing. */
  deactivate(toolId: string): void {
    assertToolId(toolId);
    if (this._activeToolId !== toolId) return;

    this.runDeactivation(toolId);
    this._activeToolId = null;

    this.bus.emit('tool:changed', { previous: toolId, current: null });
    this.bus.emit('tool:panel-toggled', { toolId, isActive: false });
  }

  toggle(toolId: string): void {
    if (this.isActive(toolId)) {
      this.deactivate(toolId);
    } else {
      this.activate(toolId);
    }
  }

  deactivateAll(): void {
    if (this._activeToolId !== null) {
      this.deactivate(this._activeToolId);
    }
  }

  /**
   * Register the cleanup run when `toolId` is deactivated or superseded.
   * Replaces any earlier callback for the same id.
   */
  registerDeactivationCallback(toolId: string, onDeactivate: () => void): void {
    assertToolId(toolId);
    this.deactivationCallbacks.set(toolId, onDeactivate);
  }

  private runDeactivation(toolId: string): void {
    this.deactivationCallbacks.get(toolId)?.();
  }
}

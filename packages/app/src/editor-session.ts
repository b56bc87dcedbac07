/**
 * @module editor-session
 * Host glue for one editor view.
 *
 * An `EditorSession` owns the editor services, the {@link ImageEditorCore},
 * a document service and the UI store, and keeps them in step:
 *
 * - Pointer input arrives in screen coordinates and is mapped to image space
 *   before it reaches the core.
 * - Finished strokes and shapes published on the bus are baked right away.
 * - Slider changes in the store push a preview while the matching
 *   adjustment tool is active.
 * - Every notification that affects the picture triggers a full redraw,
 *   handed to `onFrame`.
 */

import * as path from 'path';
import type { Bitmap, Color, DocumentService, Logger, Modifiers, Point, Size } from '@layerkit/types';
import { ImageEditorCore, ToolIds, consoleLogger, createEditorServices } from '@layerkit/core';
import type { EditorOptions, EditorServices } from '@layerkit/core';
import { ViewportTransform, computeFitZoom, renderFrame } from '@layerkit/render';
import type { RenderedFrame } from '@layerkit/render';
import { DocumentServiceImpl } from '@layerkit/io';
import { createEditorStore } from './editor-store';
import type { EditorStore, EditorStoreState } from './editor-store';
import { resolveKeyAction } from './keymap';

const NO_MODIFIERS: Modifiers = { shift: false };

export interface EditorSessionOptions {
  options?: Partial<EditorOptions>;
  logger?: Logger;
  /** Defaults to a {@link DocumentServiceImpl} on the session's bus. */
  documents?: DocumentService;
  /** Receives every rendered frame. */
  onFrame?: (frame: RenderedFrame) => void;
  background?: Color;
  viewSize?: Size;
}

export class EditorSession {
  readonly services: EditorServices;
  readonly core: ImageEditorCore;
  readonly store: EditorStore;
  readonly documents: DocumentService;

  private readonly logger: Logger;
  private readonly onFrame: ((frame: RenderedFrame) => void) | null;
  private readonly background: Color | undefined;
  private readonly unsubscribers: Array<() => void> = [];
  private rendering = false;
  private disposed = false;

  constructor(sessionOptions: EditorSessionOptions = {}) {
    this.logger = sessionOptions.logger ?? consoleLogger('EditorSession');
    this.services = createEditorServices(sessionOptions.options, { logger: this.logger });
    this.core = new ImageEditorCore(this.services);
    this.store = createEditorStore(this.services.options);
    this.documents =
      sessionOptions.documents ??
      new DocumentServiceImpl({
        logger: this.logger,
        bus: this.services.bus,
        defaultQuality: this.services.options.jpegQuality,
        uniqueNameSuffix: this.services.options.uniqueNameSuffix,
        uniqueNameMaxAttempts: this.services.options.uniqueNameMaxAttempts,
      });
    this.onFrame = sessionOptions.onFrame ?? null;
    this.background = sessionOptions.background;
    if (sessionOptions.viewSize) this.store.getState().setViewSize(sessionOptions.viewSize);

    this.subscribeBus();
    this.unsubscribers.push(this.store.subscribe((state, prev) => this.onStoreChange(state, prev)));
  }

  // ── documents ────────────────────────────────────────────────────────

  /** Load an image file. Returns false (and reports a status) when it cannot be read. */
  open(filePath: string): boolean {
    const bitmap = this.documents.load(filePath);
    if (!bitmap) {
      this.status(`Could not open ${path.basename(filePath)}`);
      return false;
    }
    this.core.loadBitmap(bitmap, filePath);
    return true;
  }

  loadBitmap(bitmap: Bitmap, filePath: string | null = null): void {
    this.core.loadBitmap(bitmap, filePath);
  }

  /**
   * Write the committed image (flattened, without any preview) to `filePath`,
   * or to the current path when omitted.
   */
  save(filePath?: string, quality?: number): boolean {
    const target = filePath ?? this.core.currentPath;
    const bitmap = this.core.getCompositeBitmap();
    if (!target || !bitmap) return false;

    if (!this.documents.save(bitmap, target, undefined, quality)) {
      this.status(`Save failed: ${path.basename(target)}`);
      return false;
    }
    this.core.markSaved(target);
    return true;
  }

  /** Save next to the current file under a fresh `_edited_NNN` name. Returns the path written. */
  saveAsNew(quality?: number): string | null {
    const current = this.core.currentPath;
    if (!current) return null;
    const extension = path.extname(current);
    const target = this.documents.generateUniqueFilePath(
      path.dirname(current),
      path.basename(current, extension),
      extension,
    );
    return this.save(target, quality) ? target : null;
  }

  // ── input ────────────────────────────────────────────────────────────

  pointerDown(screen: Point, modifiers: Modifiers = NO_MODIFIERS): boolean {
    const point = this.toImage(screen);
    if (!point) return false;
    const changed = this.core.handlePointerDown(point, modifiers);
    this.store.getState().setCursor(this.core.getCursor(point));
    if (changed) this.render();
    return changed;
  }

  pointerMove(screen: Point, modifiers: Modifiers = NO_MODIFIERS): boolean {
    const point = this.toImage(screen);
    if (!point) return false;
    const changed = this.core.handlePointerMove(point, modifiers);
    this.store.getState().setCursor(this.core.getCursor(point));
    if (changed) this.render();
    return changed;
  }

  pointerUp(): boolean {
    const changed = this.core.handlePointerUp();
    if (changed) this.render();
    return changed;
  }

  /** Handle a shortcut. Returns true when the key was consumed. */
  keyDown(key: string, modifiers: Modifiers = NO_MODIFIERS): boolean {
    const action = resolveKeyAction(key, modifiers);
    const { viewport, tools } = this.services;
    switch (action) {
      case 'zoom-in':
        viewport.zoomIn();
        return true;
      case 'zoom-out':
        viewport.zoomOut();
        return true;
      case 'zoom-actual':
        viewport.zoomToActual();
        return true;
      case 'zoom-fit':
        viewport.zoomToFit();
        return true;
      case 'apply-crop':
        if (!tools.isActive(ToolIds.Crop)) return false;
        return this.applyCrop();
      case 'cancel-crop':
        if (tools.isActive(ToolIds.Crop)) return this.core.cancelCrop();
        return this.cancelAdjustment();
      case null:
        return false;
    }
  }

  /** Crop to the current region; the crop tool stays active. */
  applyCrop(): boolean {
    if (!this.core.applyCrop()) return false;
    this.status(`Cropped to ${this.core.width}x${this.core.height}`);
    return true;
  }

  // ── tools and adjustments ────────────────────────────────────────────

  /**
   * Make `toolId` active. Adjustment tools start from neutral sliders.
   * @throws Error for a blank id.
   */
  activateTool(toolId: string): void {
    if (isAdjustmentTool(toolId) && !this.services.tools.isActive(toolId)) {
      this.store.getState().resetAdjustments();
    }
    this.services.tools.activate(toolId);
  }

  toggleTool(toolId: string): void {
    if (this.services.tools.isActive(toolId)) {
      this.services.tools.deactivate(toolId);
    } else {
      this.activateTool(toolId);
    }
  }

  /** Bake the active adjustment tool's slider values and close the tool. */
  commitAdjustment(): boolean {
    const { tools } = this.services;
    const { brightnessContrast, colorBalance } = this.store.getState();
    let committed: boolean;
    let toolId: string;
    if (tools.isActive(ToolIds.BrightnessContrast)) {
      toolId = ToolIds.BrightnessContrast;
      committed = this.core.applyBrightnessContrast(brightnessContrast);
    } else if (tools.isActive(ToolIds.ColorBalance)) {
      toolId = ToolIds.ColorBalance;
      committed = this.core.applyColorBalance(colorBalance);
    } else {
      return false;
    }

    this.store.getState().resetAdjustments();
    tools.deactivate(toolId);
    if (committed) this.status('Adjustment applied');
    return committed;
  }

  /** Drop the preview, reset the sliders and close the adjustment tool. */
  cancelAdjustment(): boolean {
    const toolId = this.services.tools.activeToolId;
    if (toolId === null || !isAdjustmentTool(toolId)) return false;
    this.core.clearPreview();
    this.store.getState().resetAdjustments();
    this.services.tools.deactivate(toolId);
    return true;
  }

  setViewSize(size: Size): void {
    this.store.getState().setViewSize(size);
  }

  // ── rendering ────────────────────────────────────────────────────────

  /**
   * Draw a frame from the current state and hand it to `onFrame`. In fit
   * mode the computed fit zoom is pushed back to the viewport manager.
   * Re-entrant calls (from the resulting `viewport:changed`) are ignored.
   */
  render(): RenderedFrame | null {
    if (this.rendering || this.disposed) return null;
    this.rendering = true;
    try {
      const { viewSize } = this.store.getState();
      const { viewport, tools } = this.services;
      const image = this.core.getDisplayBitmap();
      const drawing = tools.isActive(ToolIds.Drawing);
      const result = renderFrame({
        viewSize,
        image,
        viewport: viewport.getState(),
        background: this.background,
        crop: tools.isActive(ToolIds.Crop) ? this.core.cropTool.getState() : null,
        stroke: drawing ? this.core.drawingTool.getPreview() : null,
        shape: drawing ? this.core.shapeTool.getPreview() : null,
      });

      if (result.transform && image) {
        this.core.cropTool.setViewScale(result.transform.scale);
        if (viewport.isFitMode) {
          viewport.setFitModeWithZoom(computeFitZoom(image, viewSize, viewport.minZoom, viewport.maxZoom));
        }
      }
      this.onFrame?.(result);
      return result;
    } finally {
      this.rendering = false;
    }
  }

  /** Screen point to image point, or null when no image is loaded. */
  toImage(screen: Point): Point | null {
    if (!this.core.hasImage) return null;
    const transform = ViewportTransform.compute(
      { width: this.core.width, height: this.core.height },
      this.store.getState().viewSize,
      this.services.viewport.getState(),
    );
    return transform.screenToImage(screen);
  }

  /** Unsubscribe from everything and release the image. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    this.core.dispose();
  }

  // ── wiring ───────────────────────────────────────────────────────────

  private subscribeBus(): void {
    const { bus } = this.services;
    const store = this.store;
    const redraw = (): void => {
      this.render();
    };
    this.unsubscribers.push(
      bus.on('drawing:stroke-completed', (stroke) => {
        this.core.applyStroke(stroke);
      }),
      bus.on('shape:completed', (shape) => {
        this.core.applyShape(shape);
      }),
      bus.on('image:changed', redraw),
      bus.on('layer:structure-changed', redraw),
      bus.on('layer:content-changed', redraw),
      bus.on('layer:active-changed', redraw),
      bus.on('layer:mode-changed', redraw),
      bus.on('image:loaded', ({ path: filePath, width, height }) => {
        const name = filePath ? path.basename(filePath) : 'Untitled';
        this.status(`Opened ${name} (${width}x${height})`);
      }),
      bus.on('image:saved', ({ path: filePath }) => {
        this.status(`Saved ${path.basename(filePath)}`);
      }),
      bus.on('viewport:changed', (state) => {
        store.getState().setViewport(state);
        this.render();
      }),
      bus.on('tool:changed', ({ current }) => {
        store.getState().setActiveTool(current);
        this.render();
      }),
      bus.on('document:dirty', ({ isDirty }) => {
        store.getState().setDirty(isDirty);
      }),
      bus.on('status:message', ({ message }) => {
        store.getState().setStatusMessage(message);
      }),
    );
  }

  private onStoreChange(state: EditorStoreState, prev: EditorStoreState): void {
    const { tools } = this.services;
    if (state.drawingMode !== prev.drawingMode) {
      this.core.setDrawingMode(state.drawingMode);
    }
    if (state.brush !== prev.brush) {
      this.core.drawingTool.setBrush(state.brush);
    }
    if (state.shape !== prev.shape) {
      this.core.shapeTool.setSettings(state.shape);
    }
    if (state.brightnessContrast !== prev.brightnessContrast && tools.isActive(ToolIds.BrightnessContrast)) {
      this.core.setBrightnessContrastPreview(state.brightnessContrast);
    }
    if (state.colorBalance !== prev.colorBalance && tools.isActive(ToolIds.ColorBalance)) {
      this.core.setColorBalancePreview(state.colorBalance);
    }
    if (state.viewSize !== prev.viewSize) {
      this.render();
    }
  }

  private status(message: string): void {
    this.logger.debug(message);
    this.services.bus.emit('status:message', { message });
  }
}

function isAdjustmentTool(toolId: string): boolean {
  return toolId === ToolIds.BrightnessContrast || toolId === ToolIds.ColorBalance;
}

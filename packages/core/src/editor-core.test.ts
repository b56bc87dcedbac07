import { describe, expect, it, vi } from 'vitest';
import type { DrawingStroke } from '@layerkit/types';
import { createBitmap, fillBitmap, getPixel, hashBitmap, setPixel } from './bitmap';
import { ImageEditorCore } from './editor-core';
import { createEditorServices } from './editor-services';
import { applyAdjustment } from './filters/adjustments';
import { silentLogger } from './logger';
import { ToolIds } from './tool-manager';

const GRAY = { r: 100, g: 100, b: 100, a: 1 };
const RED = { r: 255, g: 0, b: 0, a: 1 };

function setup(width = 4, height = 4) {
  const services = createEditorServices({}, { logger: silentLogger });
  const core = new ImageEditorCore(services);
  const bitmap = createBitmap(width, height);
  fillBitmap(bitmap, GRAY);
  core.loadBitmap(bitmap, '/photos/test.png');
  return { services, core };
}

function dot(x: number, y: number): DrawingStroke {
  return { points: [{ x, y }], color: RED, size: 2, shape: 'square' };
}

function compositeHash(core: ImageEditorCore): string {
  const composite = core.getCompositeBitmap();
  if (!composite) throw new Error('no image');
  return hashBitmap(composite);
}

describe('ImageEditorCore', () => {
  describe('loading', () => {
    it('publishes the loaded image and resets the viewport', () => {
      const services = createEditorServices({}, { logger: silentLogger });
      const core = new ImageEditorCore(services);
      const loaded = vi.fn();
      services.bus.on('image:loaded', loaded);
      services.viewport.zoomToActual();

      core.loadBitmap(createBitmap(8, 6), 'a.png');

      expect(loaded).toHaveBeenCalledWith({ path: 'a.png', width: 8, height: 6 });
      expect(services.viewport.isFitMode).toBe(true);
      expect(core.hasImage).toBe(true);
      expect(core.isDirty).toBe(false);
    });

    it('ignores input without an image', () => {
      const services = createEditorServices({}, { logger: silentLogger });
      const core = new ImageEditorCore(services);
      services.tools.activate(ToolIds.Crop);
      expect(core.handlePointerDown({ x: 1, y: 1 })).toBe(false);
      expect(core.applyStroke(dot(1, 1))).toBe(false);
      expect(core.crop({ x: 0, y: 0, width: 1, height: 1 })).toBe(false);
      expect(core.getDisplayBitmap()).toBeNull();
      expect(core.getCursor({ x: 1, y: 1 })).toBe('default');
    });
  });

  describe('crop', () => {
    it('crops the dragged region and keeps the tool active', () => {
      const { services, core } = setup(100, 100);
      services.tools.activate(ToolIds.Crop);

      core.handlePointerDown({ x: 10, y: 10 });
      core.handlePointerMove({ x: 90, y: 90 });
      core.handlePointerUp();

      expect(core.applyCrop()).toBe(true);
      expect(core.width).toBe(80);
      expect(core.height).toBe(80);
      expect(core.cropTool.hasRegion).toBe(false);
      expect(services.tools.activeToolId).toBe(ToolIds.Crop);

      core.handlePointerDown({ x: 0, y: 0 });
      core.handlePointerMove({ x: 40, y: 40 });
      core.handlePointerUp();
      expect(core.applyCrop()).toBe(true);
      expect(core.width).toBe(40);
    });

    it('refuses to apply without a region', () => {
      const { core } = setup();
      expect(core.applyCrop()).toBe(false);
      expect(core.crop({ x: 1, y: 1, width: 0, height: 2 })).toBe(false);
      expect(core.crop({ x: 10, y: 10, width: 2, height: 2 })).toBe(false);
    });

    it('cancels without touching pixels', () => {
      const { core } = setup();
      const before = compositeHash(core);
      core.cropTool.setRegion({ x: 0, y: 0, width: 2, height: 2 });
      expect(core.cancelCrop()).toBe(true);
      expect(core.cropTool.hasRegion).toBe(false);
      expect(compositeHash(core)).toBe(before);
      expect(core.cancelCrop()).toBe(false);
    });

    it('clears the region when another tool takes over', () => {
      const { services, core } = setup(100, 100);
      services.tools.activate(ToolIds.Crop);
      core.handlePointerDown({ x: 10, y: 10 });
      core.handlePointerMove({ x: 50, y: 50 });
      core.handlePointerUp();

      services.tools.activate(ToolIds.Drawing);
      expect(core.cropTool.hasRegion).toBe(false);
    });

    it('reports crop cursors', () => {
      const { services, core } = setup(100, 100);
      expect(core.getCursor({ x: 5, y: 5 })).toBe('default');
      services.tools.activate(ToolIds.Crop);
      expect(core.getCursor({ x: 5, y: 5 })).toBe('crosshair');
      core.cropTool.setRegion({ x: 10, y: 10, width: 80, height: 80 });
      expect(core.getCursor({ x: 50, y: 50 })).toBe('move');
    });
  });

  describe('drawing', () => {
    it('routes freehand input to the brush and publishes the stroke', () => {
      const { services, core } = setup(20, 20);
      const completed = vi.fn();
      services.bus.on('drawing:stroke-completed', completed);
      services.tools.activate(ToolIds.Drawing);

      core.handlePointerDown({ x: 1, y: 1 });
      core.handlePointerMove({ x: 5, y: 1 });
      expect(core.handlePointerUp()).toBe(true);

      expect(completed).toHaveBeenCalledOnce();
      expect(core.isDirty).toBe(false);
    });

    it('routes input to the shape tool for parametric modes', () => {
      const { services, core } = setup(20, 20);
      const completed = vi.fn();
      services.bus.on('shape:completed', completed);
      services.tools.activate(ToolIds.Drawing);
      core.setDrawingMode('ellipse');

      core.handlePointerDown({ x: 2, y: 2 });
      core.handlePointerMove({ x: 12, y: 10 });
      core.handlePointerUp();

      expect(completed).toHaveBeenCalledWith(expect.objectContaining({ type: 'ellipse', end: { x: 12, y: 10 } }));
    });

    it('bakes strokes and marks the document dirty once', () => {
      const { services, core } = setup();
      const dirty = vi.fn();
      services.bus.on('document:dirty', dirty);

      expect(core.applyStroke(dot(2, 2))).toBe(true);
      core.applyStroke(dot(1, 1));

      const composite = core.getCompositeBitmap();
      expect(composite && getPixel(composite, 2, 2)).toEqual([255, 0, 0, 255]);
      expect(composite && getPixel(composite, 0, 3)).toEqual([100, 100, 100, 255]);
      expect(dirty).toHaveBeenCalledOnce();
      expect(dirty).toHaveBeenCalledWith({ isDirty: true });

      core.markSaved('/photos/out.png');
      expect(dirty).toHaveBeenLastCalledWith({ isDirty: false });
      expect(core.currentPath).toBe('/photos/out.png');
    });

    it('bakes shapes', () => {
      const { core } = setup(10, 10);
      core.applyShape({
        type: 'rectangle',
        start: { x: 2, y: 2 },
        end: { x: 6, y: 6 },
        fillMode: 'fill',
        strokeColor: RED,
        fillColor: RED,
        strokeWidth: 1,
      });
      const composite = core.getCompositeBitmap();
      expect(composite && getPixel(composite, 3, 3)).toEqual([255, 0, 0, 255]);
      expect(composite && getPixel(composite, 7, 7)).toEqual([100, 100, 100, 255]);
    });

    it('rejects empty strokes', () => {
      const { core } = setup();
      expect(core.applyStroke({ points: [], color: RED, size: 2, shape: 'round' })).toBe(false);
    });
  });

  describe('adjustment preview', () => {
    it('never mutates the committed bitmap while previewing', () => {
      const { core } = setup();
      const committed = compositeHash(core);

      core.setBrightnessContrastPreview({ brightness: 10, contrast: 0 });
      const first = core.getDisplayBitmap();
      const firstHash = first ? hashBitmap(first) : '';
      core.setBrightnessContrastPreview({ brightness: -10, contrast: 0 });
      const second = core.getDisplayBitmap();
      const secondHash = second ? hashBitmap(second) : '';

      expect(firstHash).not.toBe(secondHash);
      expect(compositeHash(core)).toBe(committed);
      expect(core.isPreviewActive).toBe(true);
    });

    it('commits the previewed adjustment and empties the slot', () => {
      const { core } = setup();
      core.setBrightnessContrastPreview({ brightness: 10, contrast: 0 });
      expect(core.applyPreview()).toBe(true);

      expect(core.isPreviewActive).toBe(false);
      const composite = core.getCompositeBitmap();
      expect(composite && getPixel(composite, 0, 0)).toEqual([125, 125, 125, 255]);
      expect(core.isDirty).toBe(true);
    });

    it('cancels without mutation', () => {
      const { core } = setup();
      const committed = compositeHash(core);
      core.setColorBalancePreview({
        shadows: { cyanRed: 40, magentaGreen: 0, yellowBlue: 0 },
        midtones: { cyanRed: 0, magentaGreen: 0, yellowBlue: 0 },
        highlights: { cyanRed: 0, magentaGreen: 0, yellowBlue: 0 },
        preserveLuminosity: true,
      });
      core.clearPreview();
      expect(core.isPreviewActive).toBe(false);
      expect(core.getDisplayBitmap()).toBe(core.getCompositeBitmap());
      expect(compositeHash(core)).toBe(committed);
    });

    it('treats a no-op adjustment as success without changes', () => {
      const { core } = setup();
      const committed = compositeHash(core);
      core.setBrightnessContrastPreview({ brightness: 10, contrast: 0 });

      expect(core.setBrightnessContrastPreview({ brightness: 0, contrast: 0 })).toBe(true);
      expect(core.isPreviewActive).toBe(false);
      expect(core.applyBrightnessContrast({ brightness: 0, contrast: 0 })).toBe(true);
      expect(compositeHash(core)).toBe(committed);
      expect(core.isDirty).toBe(false);
    });

    it('drops the preview when the adjustment tool is closed', () => {
      const { services, core } = setup();
      services.tools.activate(ToolIds.BrightnessContrast);
      core.setBrightnessContrastPreview({ brightness: 10, contrast: 0 });
      services.tools.deactivate(ToolIds.BrightnessContrast);
      expect(core.isPreviewActive).toBe(false);
    });
  });

  describe('layer mode', () => {
    it('paints into the active layer only', () => {
      const { services, core } = setup();
      expect(core.enableLayerMode()).toBe(true);
      const top = services.layers.addLayer('Top');

      core.applyStroke(dot(2, 2));

      const base = services.layers.layers[0];
      expect(top && getPixel(top.bitmap, 2, 2)).toEqual([255, 0, 0, 255]);
      expect(getPixel(base.bitmap, 2, 2)).toEqual([100, 100, 100, 255]);
      const composite = core.getCompositeBitmap();
      expect(composite && getPixel(composite, 2, 2)).toEqual([255, 0, 0, 255]);
    });

    it('refuses to paint a locked layer', () => {
      const { services, core } = setup();
      core.enableLayerMode();
      const base = services.layers.activeLayer;
      if (base) services.layers.setLayerLocked(base, true);
      expect(core.applyStroke(dot(2, 2))).toBe(false);
    });

    it('previews against the active layer', () => {
      const { services, core } = setup();
      core.enableLayerMode();
      const base = services.layers.activeLayer;
      services.layers.addLayer('Top');
      if (base) services.layers.setActiveLayer(base);

      core.setBrightnessContrastPreview({ brightness: 10, contrast: 0 });

      const display = core.getDisplayBitmap();
      expect(display && getPixel(display, 0, 0)).toEqual([125, 125, 125, 255]);
      expect(base && getPixel(base.bitmap, 0, 0)).toEqual([100, 100, 100, 255]);
    });

    it('moves the preview to the layer that becomes active', () => {
      const { services, core } = setup();
      core.enableLayerMode();
      const base = services.layers.activeLayer;
      const top = services.layers.addLayer('Top');
      if (!base || !top) throw new Error('expected two layers');
      setPixel(top.bitmap, 0, 0, [255, 0, 0, 255]);
      services.layers.notifyLayerContentChanged(top);
      core.setBrightnessContrastPreview({ brightness: 10, contrast: 0 });
      core.getDisplayBitmap();

      services.layers.setActiveLayer(base);

      const display = core.getDisplayBitmap();
      expect(display && getPixel(display, 1, 1)).toEqual([125, 125, 125, 255]);
      expect(display && getPixel(display, 0, 0)).toEqual([255, 0, 0, 255]);
      const composite = core.getCompositeBitmap();
      expect(composite && getPixel(composite, 1, 1)).toEqual([100, 100, 100, 255]);

      services.layers.setLayerLocked(base, true);
      const locked = core.getDisplayBitmap();
      expect(locked && getPixel(locked, 1, 1)).toEqual([100, 100, 100, 255]);
    });

    it('keeps previewing at the new size after the stack is cropped', () => {
      const { services, core } = setup();
      core.enableLayerMode();
      core.setBrightnessContrastPreview({ brightness: 10, contrast: 0 });
      core.getDisplayBitmap();

      expect(services.layers.cropAll({ x: 0, y: 0, width: 2, height: 3 })).toBe(true);

      const display = core.getDisplayBitmap();
      expect(display && [display.width, display.height]).toEqual([2, 3]);
      expect(display && getPixel(display, 1, 2)).toEqual([125, 125, 125, 255]);
      expect(core.isPreviewActive).toBe(true);
    });

    it('recomputes the preview after the layer is edited in place', () => {
      const { services, core } = setup();
      core.enableLayerMode();
      const base = services.layers.activeLayer;
      if (!base) throw new Error('expected a layer');
      const adjustment = { kind: 'brightness-contrast', settings: { brightness: 10, contrast: 0 } } as const;
      core.setPreview(adjustment);
      core.getDisplayBitmap();

      setPixel(base.bitmap, 1, 1, [0, 0, 0, 255]);
      services.layers.notifyLayerContentChanged(base);

      const expected = applyAdjustment(base.bitmap, adjustment);
      const display = core.getDisplayBitmap();
      expect(display && getPixel(display, 1, 1)).toEqual(getPixel(expected, 1, 1));
      expect(display && getPixel(display, 0, 0)).toEqual([125, 125, 125, 255]);
    });

    it('crops and transforms every layer', () => {
      const { services, core } = setup(6, 4);
      core.enableLayerMode();
      services.layers.addLayer('Top');

      core.crop({ x: 1, y: 1, width: 4, height: 2 });
      expect(services.layers.layers.map((l) => [l.width, l.height])).toEqual([
        [4, 2],
        [4, 2],
      ]);

      core.applyTransform('rotate-cw');
      expect(core.width).toBe(2);
      expect(core.height).toBe(4);
    });

    it('flattens back into a single bitmap', () => {
      const { services, core } = setup();
      core.enableLayerMode();
      services.layers.addLayer('Top');
      core.applyStroke(dot(2, 2));

      expect(core.disableLayerMode()).toBe(true);
      expect(services.layers.isLayerMode).toBe(false);
      const composite = core.getCompositeBitmap();
      expect(composite && getPixel(composite, 2, 2)).toEqual([255, 0, 0, 255]);
    });
  });

  describe('transforms and reset', () => {
    it('rotates the working bitmap', () => {
      const { core } = setup(4, 2);
      expect(core.applyTransform('rotate-cw')).toBe(true);
      expect(core.width).toBe(2);
      expect(core.height).toBe(4);
    });

    it('restores the original pixels', () => {
      const { core } = setup();
      const original = compositeHash(core);
      core.applyStroke(dot(2, 2));
      expect(core.resetToOriginal()).toBe(true);
      expect(compositeHash(core)).toBe(original);
      expect(core.isDirty).toBe(false);
    });

    it('clears everything', () => {
      const { core } = setup();
      core.clear();
      expect(core.hasImage).toBe(false);
      expect(core.currentPath).toBeNull();
      expect(core.resetToOriginal()).toBe(false);
    });
  });
});

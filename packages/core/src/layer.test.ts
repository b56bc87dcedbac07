import { describe, expect, it } from 'vitest';
import { createBitmap, getPixel, setPixel } from './bitmap';
import { LayerImpl } from './layer';

describe('LayerImpl', () => {
  it('creates a visible, opaque, unlocked blank layer', () => {
    const layer = LayerImpl.blank('Layer 1', 8, 4);
    expect(layer.name).toBe('Layer 1');
    expect([layer.width, layer.height]).toEqual([8, 4]);
    expect(layer.visible).toBe(true);
    expect(layer.opacity).toBe(1);
    expect(layer.locked).toBe(false);
    expect(layer.canEdit).toBe(true);
    expect(layer.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('copies the bitmap in fromBitmap', () => {
    const source = createBitmap(2, 2);
    const layer = LayerImpl.fromBitmap('Copy', source);
    setPixel(source, 0, 0, [9, 9, 9, 9]);
    expect(getPixel(layer.bitmap, 0, 0)).toEqual([0, 0, 0, 0]);
  });

  it('clamps opacity and ignores tiny changes', () => {
    const layer = LayerImpl.blank('L', 1, 1);
    layer.opacity = 1.7;
    expect(layer.opacity).toBe(1);
    layer.opacity = -2;
    expect(layer.opacity).toBe(0);
    layer.opacity = 0.0005;
    expect(layer.opacity).toBe(0);
    layer.opacity = 0.25;
    expect(layer.opacity).toBe(0.25);
  });

  it('fills and clears pixels', () => {
    const layer = LayerImpl.blank('L', 2, 2);
    layer.fill({ r: 10, g: 20, b: 30, a: 1 });
    expect(getPixel(layer.bitmap, 1, 1)).toEqual([10, 20, 30, 255]);
    layer.clear();
    expect(getPixel(layer.bitmap, 1, 1)).toEqual([0, 0, 0, 0]);
  });

  it('clones pixels and properties under a "Copy" name', () => {
    const layer = LayerImpl.blank('Sky', 2, 2);
    layer.fill({ r: 1, g: 2, b: 3, a: 1 });
    layer.opacity = 0.5;
    layer.visible = false;

    const copy = layer.clone();

    expect(copy.name).toBe('Sky Copy');
    expect(copy.id).not.toBe(layer.id);
    expect(copy.opacity).toBe(0.5);
    expect(copy.visible).toBe(false);
    expect(copy.bitmap).not.toBe(layer.bitmap);
    expect(getPixel(copy.bitmap, 0, 0)).toEqual([1, 2, 3, 255]);
  });

  it('crops and resizes its buffer', () => {
    const layer = LayerImpl.blank('L', 10, 10);
    layer.crop({ x: 2, y: 2, width: 5, height: 3 });
    expect([layer.width, layer.height]).toEqual([5, 3]);
    layer.resize(6, 6);
    expect([layer.width, layer.height]).toEqual([6, 6]);
  });

  it('refuses edits when locked', () => {
    const layer = LayerImpl.blank('L', 1, 1);
    layer.locked = true;
    expect(layer.canEdit).toBe(false);
  });

  it('releases the buffer on dispose and is idempotent', () => {
    const layer = LayerImpl.blank('Gone', 1, 1);
    layer.dispose();
    layer.dispose();
    expect(layer.isDisposed).toBe(true);
    expect(layer.canEdit).toBe(false);
    expect(() => layer.bitmap).toThrow('Layer "Gone" has been disposed');
    expect(() => layer.replaceBitmap(createBitmap(1, 1))).toThrow(/disposed/);
  });
});
